import type { LibrarySummary, MediaItem, MediaType } from '@subtitle-sync/shared-types';
import type { PlexApi } from '../clients/PlexClient';
import {
  PLEX_STREAM_TYPE_SUBTITLE,
  type PlexLibraryItem,
  type PlexRemoteSubtitle,
  type PlexServerInfo,
} from '../types/plex.types';
import { ConfigurationError, NotFoundError } from '../utils/errors';
import { normalizeLanguageCode } from '../utils/language';
import { logger } from '../utils/logger';
import { type Sleep, sleep } from '../utils/retry';

export interface PlexServiceOptions {
  /** How long to give the server after attaching a subtitle before re-reading the item. */
  subtitleSettleMs?: number;
  sleep?: Sleep;
}

export interface PlexAgentResult {
  providerTitle: string;
}

function parseGuid(guids: PlexLibraryItem['Guid'], scheme: 'imdb' | 'tmdb'): string | undefined {
  const prefix = `${scheme}://`;
  const match = (guids || []).find((guid) => guid.id.startsWith(prefix));
  return match ? match.id.slice(prefix.length) : undefined;
}

function existingSubtitleLanguages(item: PlexLibraryItem): string[] {
  const languages: string[] = [];
  for (const media of item.Media || []) {
    for (const part of media.Part || []) {
      for (const stream of part.Stream || []) {
        if (stream.streamType !== PLEX_STREAM_TYPE_SUBTITLE) continue;
        const code = normalizeLanguageCode(stream.languageCode);
        if (code && !languages.includes(code)) {
          languages.push(code);
        }
      }
    }
  }
  return languages;
}

export function toMediaItem(item: PlexLibraryItem, libraryTitle: string): MediaItem {
  const part = item.Media?.[0]?.Part?.[0];
  const isEpisode = item.type === 'episode';

  return {
    ratingKey: item.ratingKey,
    type: isEpisode ? 'episode' : 'movie',
    title: item.title,
    year: item.year,
    showTitle: isEpisode ? item.grandparentTitle : undefined,
    seasonNumber: isEpisode ? item.parentIndex : undefined,
    episodeNumber: isEpisode ? item.index : undefined,
    filePath: part?.file,
    fileSize: part?.size,
    duration: item.duration,
    subtitleLanguages: existingSubtitleLanguages(item),
    imdbId: parseGuid(item.Guid, 'imdb'),
    tmdbId: parseGuid(item.Guid, 'tmdb'),
    libraryTitle,
  };
}

export function libraryHolds(library: LibrarySummary, mediaType?: MediaType): boolean {
  if (!mediaType) return true;
  return mediaType === 'movie' ? library.type === 'movie' : library.type === 'show';
}

export class PlexService {
  private client: PlexApi;
  private readonly subtitleSettleMs: number;
  private readonly sleep: Sleep;
  // Selections already sent to the server, keyed by `ratingKey:language`
  private readonly attached = new Map<string, PlexRemoteSubtitle>();

  constructor(client: PlexApi, options: PlexServiceOptions = {}) {
    this.client = client;
    this.subtitleSettleMs = options.subtitleSettleMs ?? 2000;
    this.sleep = options.sleep ?? sleep;
  }

  async getServerInfo(): Promise<PlexServerInfo> {
    return this.client.getServerInfo();
  }

  /** Movie and TV show libraries, in server order. */
  async getLibraries(): Promise<LibrarySummary[]> {
    const libraries = await this.client.getLibraries();
    const summaries: LibrarySummary[] = [];
    for (const library of libraries) {
      if (library.type === 'movie' || library.type === 'show') {
        summaries.push({ key: library.key, title: library.title, type: library.type });
      }
    }
    return summaries;
  }

  async findLibrary(name: string): Promise<LibrarySummary> {
    const libraries = await this.client.getLibraries();
    const library = libraries.find((entry) => entry.title === name);
    if (!library) {
      throw new ConfigurationError(`Could not find library '${name}'`);
    }
    if (library.type !== 'movie' && library.type !== 'show') {
      throw new ConfigurationError(`Unsupported library type '${library.type}' for library '${name}'`);
    }
    return { key: library.key, title: library.title, type: library.type };
  }

  /**
   * Lists the playable entries of a library: movies directly, episodes of
   * every show in the library. Entries carry no stream detail.
   */
  async listItems(library: LibrarySummary, mediaType?: MediaType): Promise<PlexLibraryItem[]> {
    if (!libraryHolds(library, mediaType)) {
      return [];
    }

    const items = await this.client.getLibraryItems(library.key);
    if (library.type === 'movie') {
      return items;
    }

    const episodes: PlexLibraryItem[] = [];
    for (const show of items) {
      const leaves = await this.client.getAllLeaves(show.ratingKey);
      episodes.push(...leaves);
    }
    return episodes;
  }

  /** Reads the current state of one item, including its subtitle streams. */
  async getMediaItem(ratingKey: string, libraryTitle: string): Promise<MediaItem> {
    const detail = await this.client.getMetadata(ratingKey);
    return toMediaItem(detail, libraryTitle);
  }

  /**
   * Lets the server's own subtitle agent fetch `language` for the item and
   * verifies that the stream is attached afterwards. A repeated call after a
   * failed verification only re-reads the item.
   */
  async downloadViaAgent(item: MediaItem, language: string): Promise<PlexAgentResult> {
    const selection = `${item.ratingKey}:${language}`;
    const chosen = this.attached.get(selection) ?? (await this.attach(item, language));
    this.attached.set(selection, chosen);

    const reloaded = await this.getMediaItem(item.ratingKey, item.libraryTitle);
    this.attached.delete(selection);
    if (!reloaded.subtitleLanguages.includes(language)) {
      throw new NotFoundError(`Plex did not attach ${language} subtitle`);
    }

    logger.info(`  ✓ Plex downloaded ${language} subtitle`);
    return { providerTitle: chosen.providerTitle || 'Plex subtitle agent' };
  }

  private async attach(item: MediaItem, language: string): Promise<PlexRemoteSubtitle> {
    logger.info(`  Searching via Plex for ${language} subtitles...`);
    const results = await this.client.searchSubtitles(item.ratingKey, language);
    const chosen = results[0];
    if (!chosen) {
      throw new NotFoundError(`Plex did not find ${language} subtitle`);
    }

    await this.client.selectSubtitle(item.ratingKey, chosen, language);
    if (this.subtitleSettleMs > 0) {
      await this.sleep(this.subtitleSettleMs);
    }
    return chosen;
  }
}
