import type { MediaItem, SubtitleCandidate } from '@subtitle-sync/shared-types';
import type { OpenSubtitlesApi } from '../clients/OpenSubtitlesClient';
import type {
  OpenSubtitlesSearchParams,
  OpenSubtitlesSubtitle,
} from '../types/opensubtitles.types';
import { NotFoundError, errorMessage } from '../utils/errors';
import { normalizeLanguageCode } from '../utils/language';
import { logger } from '../utils/logger';
import { displayTitle } from '../utils/media';

export type MovieHasher = (filePath: string) => Promise<string | undefined>;

export function toCandidate(subtitle: OpenSubtitlesSubtitle): SubtitleCandidate {
  const attributes = subtitle.attributes || {};
  const file = attributes.files?.[0];
  return {
    language: normalizeLanguageCode(attributes.language) || '',
    rating: attributes.ratings ?? 0,
    downloadCount: attributes.download_count ?? 0,
    releaseName: attributes.release || 'Unknown',
    uploader: attributes.uploader?.name || 'Unknown',
    fileId: file?.file_id,
    fileName: file?.file_name,
  };
}

export function buildSearchParams(
  item: MediaItem,
  languages: readonly string[],
  movieHash?: string
): OpenSubtitlesSearchParams {
  const params: OpenSubtitlesSearchParams = {
    languages: languages.join(','),
  };

  // External ids identify the title better than its name
  if (item.imdbId) {
    params.imdb_id = item.imdbId.replace(/^tt/, '');
  } else if (item.tmdbId) {
    params.tmdb_id = item.tmdbId;
  }

  if (item.type === 'episode') {
    params.season_number = item.seasonNumber;
    params.episode_number = item.episodeNumber;
    if (!params.imdb_id && !params.tmdb_id) {
      params.query = item.showTitle || item.title;
    }
  } else if (!params.imdb_id && !params.tmdb_id) {
    params.query = item.title;
    params.year = item.year;
  }

  if (item.fileSize) {
    params.moviebytesize = item.fileSize;
  }
  if (movieHash) {
    params.moviehash = movieHash;
  }

  return params;
}

/**
 * Highest rating wins, then highest download count; on a full tie the
 * candidate the API listed first is kept.
 */
export function selectBestCandidate(
  candidates: readonly SubtitleCandidate[],
  language: string
): SubtitleCandidate | undefined {
  let best: SubtitleCandidate | undefined;
  for (const candidate of candidates) {
    if (candidate.language !== language) continue;
    if (
      !best ||
      candidate.rating > best.rating ||
      (candidate.rating === best.rating && candidate.downloadCount > best.downloadCount)
    ) {
      best = candidate;
    }
  }
  return best;
}

export class SubtitleMatcher {
  private client: Pick<OpenSubtitlesApi, 'search'>;
  private hashFile?: MovieHasher;

  constructor(client: Pick<OpenSubtitlesApi, 'search'>, hashFile?: MovieHasher) {
    this.client = client;
    this.hashFile = hashFile;
  }

  /** One search for every requested language of the item. */
  async search(item: MediaItem, languages: readonly string[]): Promise<SubtitleCandidate[]> {
    const movieHash = await this.movieHash(item);
    const results = await this.client.search(buildSearchParams(item, languages, movieHash));
    return results.map(toCandidate);
  }

  async match(item: MediaItem, language: string): Promise<SubtitleCandidate> {
    const candidates = await this.search(item, [language]);
    const best = selectBestCandidate(candidates, language);
    if (!best) {
      throw new NotFoundError(`No ${language} subtitles found for ${displayTitle(item)}`);
    }
    if (best.fileId === undefined) {
      throw new NotFoundError(`No file ID for ${language} subtitle of ${displayTitle(item)}`);
    }
    return best;
  }

  private async movieHash(item: MediaItem): Promise<string | undefined> {
    if (!this.hashFile || !item.filePath) return undefined;
    try {
      return await this.hashFile(item.filePath);
    } catch (error) {
      logger.debug(`Could not hash ${item.filePath}: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
