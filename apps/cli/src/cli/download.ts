import { Command } from 'commander';
import { OpenSubtitlesClient } from '../clients/OpenSubtitlesClient';
import { PlexClient } from '../clients/PlexClient';
import { type AppConfig, validateConfig } from '../config/services.config';
import { PlexService } from '../services/plex.service';
import { renderReport, saveReport } from '../services/report.service';
import { LocalSubtitleDownloader } from '../services/subtitle-downloader.service';
import { SubtitleMatcher } from '../services/subtitle-matcher.service';
import { type SubtitleSyncDeps, SubtitleSyncService, type SyncOptions } from '../services/subtitle-sync.service';
import { handleFatalError } from '../utils/errors';
import { logger, setLogLevel } from '../utils/logger';
import { computeMovieHash } from '../utils/moviehash';
import { type CliOptions, addConnectionOptions, parseMediaType, parsePositiveInt, resolveConfig } from './options';

async function connect(config: AppConfig): Promise<SubtitleSyncDeps> {
  const plex = new PlexService(new PlexClient(config.plex), {
    subtitleSettleMs: config.plex.subtitleSettleMs,
  });

  logger.info(`Connecting to Plex server at ${config.plex.baseUrl}...`);
  const server = await plex.getServerInfo();
  logger.info(`Connected to: ${server.friendlyName}`);

  const base = { plex, languages: config.languages, retryPolicy: config.retry };
  if (config.method === 'plex') {
    logger.info('Using Plex subtitle agent for downloads (remote method)');
    return { ...base, acquisition: { method: 'plex' } };
  }

  const opensubtitles = new OpenSubtitlesClient(config.opensubtitles);
  await opensubtitles.login();
  logger.info('Using local download method (OpenSubtitles)');
  return {
    ...base,
    acquisition: {
      method: 'local',
      matcher: new SubtitleMatcher(opensubtitles, computeMovieHash),
      downloader: new LocalSubtitleDownloader(opensubtitles),
    },
  };
}

export async function runDownload(options: CliOptions): Promise<number> {
  const config = resolveConfig(options);
  setLogLevel(config.logLevel);
  validateConfig(config);

  logger.info(`Target languages: ${config.languages.join(', ')}`);
  logger.info(`Download method: ${config.method.toUpperCase()}`);

  const sync = new SubtitleSyncService(await connect(config));

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted - finishing the current item and stopping');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  const syncOptions: SyncOptions = {
    mediaType: options.type,
    maxDownloads: options.maxDownloads,
    signal: controller.signal,
  };

  try {
    if (options.library) {
      await sync.processLibrary(options.library, syncOptions);
    } else {
      await sync.processAllLibraries(syncOptions);
    }
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  const report = renderReport(sync.records, { method: sync.method, generatedAt: new Date() });
  console.log(`\n${report}\n`);
  if (sync.records.length > 0) {
    await saveReport(config.reportFile, report);
  }

  return 0;
}

export function makeDownloadCommand(): Command {
  return addConnectionOptions(new Command('download'))
    .description('Download missing subtitles for Plex movies and TV shows')
    .option('--library <name>', 'Process only this library')
    .option('--type <type>', 'Only process items of this type: movie or episode', parseMediaType)
    .option('--max-downloads <n>', 'Maximum number of subtitles to download', parsePositiveInt)
    .option('--report <file>', 'Report output file (default: subtitle_download_report.txt)')
    .action(async (options: CliOptions) => {
      try {
        process.exitCode = await runDownload(options);
      } catch (error) {
        process.exitCode = handleFatalError(error);
      }
    });
}
