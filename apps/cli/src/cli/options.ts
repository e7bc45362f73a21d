import { Command, InvalidArgumentError } from 'commander';
import type { MediaType } from '@subtitle-sync/shared-types';
import { type AppConfig, loadConfig, parseLanguages, parseMethod } from '../config/services.config';

export interface CliOptions {
  method?: string;
  plexUrl?: string;
  plexToken?: string;
  opensubtitlesApiKey?: string;
  opensubtitlesUsername?: string;
  opensubtitlesPassword?: string;
  languages?: string[];
  library?: string;
  type?: MediaType;
  maxDownloads?: number;
  report?: string;
  verbose?: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseMediaType(value: string): MediaType {
  if (value === 'movie' || value === 'episode') return value;
  throw new InvalidArgumentError("Must be 'movie' or 'episode'.");
}

/** Connection and credential options shared by every command. */
export function addConnectionOptions(command: Command): Command {
  return command
    .option('--method <method>', 'Download method: local (OpenSubtitles) or plex (server agent)')
    .option('--plex-url <url>', 'Plex server URL')
    .option('--plex-token <token>', 'Plex authentication token')
    .option('--opensubtitles-api-key <key>', 'OpenSubtitles API key')
    .option('--opensubtitles-username <username>', 'OpenSubtitles username')
    .option('--opensubtitles-password <password>', 'OpenSubtitles password')
    .option('--languages <codes...>', 'Subtitle languages, e.g. en es fr')
    .option('-v, --verbose', 'Enable debug logging');
}

/**
 * Builds the run configuration: environment first, command-line flags on top.
 */
export function resolveConfig(options: CliOptions, env: Record<string, string | undefined> = process.env): AppConfig {
  const config = loadConfig(env);

  if (options.method !== undefined) config.method = parseMethod(options.method);
  if (options.plexUrl) config.plex.baseUrl = options.plexUrl;
  if (options.plexToken) config.plex.apiKey = options.plexToken;
  if (options.opensubtitlesApiKey) config.opensubtitles.apiKey = options.opensubtitlesApiKey;
  if (options.opensubtitlesUsername) config.opensubtitles.username = options.opensubtitlesUsername;
  if (options.opensubtitlesPassword) config.opensubtitles.password = options.opensubtitlesPassword;
  if (options.languages && options.languages.length > 0) {
    config.languages = parseLanguages(options.languages);
  }
  if (options.report) config.reportFile = options.report;
  if (options.verbose) config.logLevel = 'debug';

  return config;
}
