import type {
  DownloadMethod,
  DownloadRecord,
  LibraryStats,
  LibrarySummary,
  MediaItem,
  MediaType,
} from '@subtitle-sync/shared-types';
import { DownloadQuotaExceededError, PermissionError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { displayTitle, missingLanguages } from '../utils/media';
import { type RetryPolicy, type Sleep, isRunLevelError, runWithRetry, withRetry } from '../utils/retry';
import { type PlexService, libraryHolds } from './plex.service';
import type { LocalSubtitleDownloader } from './subtitle-downloader.service';
import { type SubtitleMatcher, selectBestCandidate } from './subtitle-matcher.service';

export interface SyncOptions {
  mediaType?: MediaType;
  /** Cap on successful downloads for the whole run. */
  maxDownloads?: number;
  signal?: AbortSignal;
}

interface LocalAcquisition {
  method: 'local';
  matcher: Pick<SubtitleMatcher, 'search'>;
  downloader: Pick<LocalSubtitleDownloader, 'mediaExists' | 'subtitleExists' | 'download'>;
}

interface PlexAcquisition {
  method: 'plex';
}

type PlexOperations = Pick<
  PlexService,
  'getLibraries' | 'findLibrary' | 'listItems' | 'getMediaItem' | 'downloadViaAgent'
>;

export interface SubtitleSyncDeps {
  plex: PlexOperations;
  acquisition: LocalAcquisition | PlexAcquisition;
  languages: string[];
  retryPolicy: RetryPolicy;
  sleep?: Sleep;
  now?: () => Date;
}

export function emptyStats(): LibraryStats {
  return { total: 0, needsSubtitles: 0, downloaded: 0, errors: 0, skipped: 0 };
}

function addStats(target: LibraryStats, source: LibraryStats): void {
  target.total += source.total;
  target.needsSubtitles += source.needsSubtitles;
  target.downloaded += source.downloaded;
  target.errors += source.errors;
  target.skipped += source.skipped;
}

export class SubtitleSyncService {
  private readonly plex: PlexOperations;
  private readonly acquisition: LocalAcquisition | PlexAcquisition;
  private readonly languages: string[];
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep?: Sleep;
  private readonly now: () => Date;
  private readonly downloads: DownloadRecord[] = [];
  private stopReason?: string;

  constructor(deps: SubtitleSyncDeps) {
    this.plex = deps.plex;
    this.acquisition = deps.acquisition;
    this.languages = deps.languages;
    this.retryPolicy = deps.retryPolicy;
    this.sleep = deps.sleep;
    this.now = deps.now ?? (() => new Date());
  }

  get method(): DownloadMethod {
    return this.acquisition.method;
  }

  /** Records of every successful download so far, in acquisition order. */
  get records(): readonly DownloadRecord[] {
    return this.downloads;
  }

  async processAllLibraries(options: SyncOptions = {}): Promise<LibraryStats> {
    const totals = emptyStats();
    const libraries = await this.plex.getLibraries();

    for (const library of libraries) {
      if (!libraryHolds(library, options.mediaType)) continue;
      if (this.shouldStop(options)) {
        logger.info(`Skipping library '${library.title}' - ${this.stopReason}`);
        continue;
      }
      addStats(totals, await this.processItems(library, options));
    }

    return totals;
  }

  async processLibrary(name: string, options: SyncOptions = {}): Promise<LibraryStats> {
    const library = await this.plex.findLibrary(name);
    if (!libraryHolds(library, options.mediaType)) {
      logger.warn(`Library '${name}' holds no ${options.mediaType} items`);
      return emptyStats();
    }
    return this.processItems(library, options);
  }

  private budgetLeft(options: SyncOptions): boolean {
    return options.maxDownloads === undefined || this.downloads.length < options.maxDownloads;
  }

  private shouldStop(options: SyncOptions): boolean {
    if (this.stopReason) return true;
    if (options.signal?.aborted) {
      this.stopReason = 'interrupted';
    } else if (!this.budgetLeft(options)) {
      this.stopReason = `download limit of ${options.maxDownloads} reached`;
    }
    return this.stopReason !== undefined;
  }

  private async processItems(library: LibrarySummary, options: SyncOptions): Promise<LibraryStats> {
    const stats = emptyStats();
    const entries = await this.plex.listItems(library, options.mediaType);
    stats.total = entries.length;

    logger.info('='.repeat(60));
    logger.info(`Processing library: ${library.title}`);
    if (options.maxDownloads !== undefined) {
      logger.info(`Max downloads: ${options.maxDownloads}`);
    }
    logger.info('='.repeat(60));
    logger.info(`Found ${entries.length} items to scan`);

    for (const [index, entry] of entries.entries()) {
      const position = `[${index + 1}/${stats.total}]`;
      if (this.shouldStop(options)) {
        stats.skipped = entries.length - index;
        logger.info(`Stopping: ${this.stopReason}. Skipping remaining ${stats.skipped} items.`);
        break;
      }

      try {
        const item = await withRetry(
          this.retryPolicy,
          () => this.plex.getMediaItem(entry.ratingKey, library.title),
          { label: `Loading ${entry.title}`, sleep: this.sleep }
        );
        const missing = missingLanguages(item, this.languages);
        if (missing.length === 0) {
          logger.debug(`${position} Skipping ${displayTitle(item)} - has all subtitles`);
          continue;
        }

        stats.needsSubtitles += 1;
        logger.info(`${position} Processing item...`);
        const result = await this.processItem(item, missing, options);
        stats.downloaded += result.downloaded;
        stats.errors += result.errors;
      } catch (error) {
        if (error instanceof DownloadQuotaExceededError) {
          this.stopReason = `download quota exhausted${error.resetTime ? ` (resets ${error.resetTime})` : ''}`;
          logger.warn(`${error.message}; stopping run`);
          stats.skipped = entries.length - index - 1;
          break;
        }
        if (isRunLevelError(error)) {
          throw error;
        }
        logger.error(`Error processing item ${index + 1}: ${errorMessage(error)}`);
        stats.errors += 1;
      }
    }

    logger.info('='.repeat(60));
    logger.info(`Summary for ${library.title}:`);
    logger.info(`  Total items scanned: ${stats.total}`);
    logger.info(`  Items needing subtitles: ${stats.needsSubtitles}`);
    logger.info(`  Subtitles downloaded: ${stats.downloaded}`);
    if (stats.skipped) {
      logger.info(`  Items skipped (${this.stopReason}): ${stats.skipped}`);
    }
    logger.info(`  Errors: ${stats.errors}`);
    logger.info('='.repeat(60));

    return stats;
  }

  private async processItem(
    item: MediaItem,
    missing: string[],
    options: SyncOptions
  ): Promise<{ downloaded: number; errors: number }> {
    if (this.acquisition.method === 'plex') {
      logger.info(`Downloading subtitles for: ${displayTitle(item)}`);
      logger.info(`  Missing languages: ${missing.join(', ')}`);
      return this.acquireViaPlex(item, missing, options);
    }
    return this.acquireLocally(this.acquisition, item, missing, options);
  }

  private async acquireViaPlex(
    item: MediaItem,
    missing: string[],
    options: SyncOptions
  ): Promise<{ downloaded: number; errors: number }> {
    const result = { downloaded: 0, errors: 0 };

    for (const language of missing) {
      if (!this.budgetLeft(options)) break;

      const outcome = await runWithRetry(
        this.retryPolicy,
        () => this.plex.downloadViaAgent(item, language),
        { label: `Plex ${language} subtitle for ${displayTitle(item)}`, sleep: this.sleep }
      );

      if (outcome.status === 'success') {
        this.downloads.push({
          mediaTitle: displayTitle(item),
          mediaType: item.type,
          language,
          rating: 0,
          downloadCount: 0,
          releaseName: outcome.value.providerTitle,
          uploader: 'Plex',
          subtitleFile: 'Downloaded by Plex',
          method: 'plex',
          timestamp: this.now(),
        });
        result.downloaded += 1;
      } else if (outcome.status === 'not_found') {
        logger.warn(`  ✗ ${outcome.reason}`);
      } else {
        logger.error(`  ✗ Failed to download via Plex: ${outcome.error.message}`);
        result.errors += 1;
      }
    }

    return result;
  }

  private async acquireLocally(
    acquisition: LocalAcquisition,
    item: MediaItem,
    missing: string[],
    options: SyncOptions
  ): Promise<{ downloaded: number; errors: number }> {
    const result = { downloaded: 0, errors: 0 };
    const { matcher, downloader } = acquisition;
    const title = displayTitle(item);

    const mediaPath = item.filePath;
    if (!mediaPath) {
      logger.warn(`Could not get path for: ${title}`);
      return result;
    }
    if (!(await downloader.mediaExists(mediaPath))) {
      logger.warn(`File not found: ${mediaPath}`);
      return result;
    }

    // A subtitle already sitting next to the file counts as present
    const wanted: string[] = [];
    for (const language of missing) {
      if (!(await downloader.subtitleExists(mediaPath, language))) {
        wanted.push(language);
      }
    }
    if (wanted.length === 0) {
      return result;
    }

    logger.info(`Downloading subtitles for: ${title}`);
    logger.info(`  Missing languages: ${wanted.join(', ')}`);
    logger.info('  Searching for subtitles...');

    const search = await runWithRetry(this.retryPolicy, () => matcher.search(item, wanted), {
      label: `Subtitle search for ${title}`,
      sleep: this.sleep,
    });
    if (search.status === 'fatal') {
      logger.error(`  ✗ Search failed: ${search.error.message}`);
      result.errors += 1;
      return result;
    }
    if (search.status === 'not_found') {
      logger.warn(`  ✗ Search failed: ${search.reason}`);
      return result;
    }
    if (search.value.length === 0) {
      logger.info('  ✗ No subtitles found');
      return result;
    }
    logger.info(`  Found ${search.value.length} subtitle option(s)`);

    for (const language of wanted) {
      if (!this.budgetLeft(options)) break;

      const best = selectBestCandidate(search.value, language);
      if (!best) {
        logger.info(`  ✗ No ${language} subtitles found`);
        continue;
      }
      if (best.fileId === undefined) {
        logger.warn(`  ✗ No file ID for ${language} subtitle`);
        continue;
      }

      logger.info(
        `  Downloading ${language} subtitle (Rating: ${best.rating.toFixed(1)}, Downloads: ${best.downloadCount})...`
      );
      const outcome = await runWithRetry(this.retryPolicy, () => downloader.download(best, mediaPath), {
        label: `Download of ${language} subtitle for ${title}`,
        sleep: this.sleep,
      });

      if (outcome.status === 'success') {
        logger.info(`  ✓ Saved: ${outcome.value}`);
        this.downloads.push({
          mediaTitle: title,
          mediaType: item.type,
          language,
          rating: best.rating,
          downloadCount: best.downloadCount,
          releaseName: best.releaseName,
          uploader: best.uploader,
          subtitleFile: outcome.value,
          method: 'local',
          timestamp: this.now(),
        });
        result.downloaded += 1;
      } else if (outcome.status === 'not_found') {
        logger.warn(`  ✗ Failed to download ${language} subtitle: ${outcome.reason}`);
      } else if (outcome.error instanceof PermissionError) {
        // The directory will not become writable for the next language either
        logger.warn(`  ✗ ${outcome.error.message}; skipping item`);
        result.errors += 1;
        break;
      } else {
        logger.error(`  ✗ Failed to save subtitle: ${outcome.error.message}`);
        result.errors += 1;
      }
    }

    return result;
  }
}
