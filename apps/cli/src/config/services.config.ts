import type { DownloadMethod } from '@subtitle-sync/shared-types';
import { ConfigurationError } from '../utils/errors';
import { normalizeLanguageCode } from '../utils/language';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../utils/retry';

export interface ServiceConfig {
  baseUrl: string;
  apiKey?: string;
  username?: string;
  password?: string;
  timeout?: number;
  userAgent?: string;
}

export interface AppConfig {
  method: DownloadMethod;
  languages: string[];
  reportFile: string;
  logLevel: string;
  plex: ServiceConfig & {
    subtitleSettleMs: number;
  };
  opensubtitles: ServiceConfig & {
    minRequestIntervalMs: number;
  };
  retry: RetryPolicy;
}

type Env = Record<string, string | undefined>;

function parseInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function parseLanguages(value: string | string[] | undefined): string[] {
  const raw = Array.isArray(value) ? value.flatMap((entry) => entry.split(',')) : (value || '').split(',');
  const languages: string[] = [];
  for (const entry of raw) {
    const code = normalizeLanguageCode(entry);
    if (code && !languages.includes(code)) {
      languages.push(code);
    }
  }
  return languages;
}

export function parseMethod(value: string | undefined): DownloadMethod {
  if (value === undefined || value === '' || value === 'local') return 'local';
  if (value === 'plex') return 'plex';
  throw new ConfigurationError(`Unknown download method '${value}' (expected local or plex)`);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const languages = parseLanguages(env.SUBTITLE_LANGUAGES);

  return {
    method: parseMethod(env.SUBTITLE_METHOD),
    languages: languages.length > 0 ? languages : ['en'],
    reportFile: env.SUBTITLE_REPORT_FILE || 'subtitle_download_report.txt',
    logLevel: env.LOG_LEVEL || 'info',

    plex: {
      baseUrl: env.PLEX_URL || 'http://localhost:32400',
      apiKey: env.PLEX_TOKEN || '', // Plex uses token instead of API key
      timeout: parseInt(env.PLEX_TIMEOUT, 30000),
      subtitleSettleMs: parseInt(env.PLEX_SUBTITLE_SETTLE_MS, 2000),
    },

    opensubtitles: {
      baseUrl: env.OPENSUBTITLES_URL || 'https://api.opensubtitles.com/api/v1',
      apiKey: env.OPENSUBTITLES_API_KEY || '',
      username: env.OPENSUBTITLES_USERNAME || '',
      password: env.OPENSUBTITLES_PASSWORD || '',
      userAgent: env.OPENSUBTITLES_USER_AGENT || 'SubtitleSync v1.0',
      timeout: parseInt(env.OPENSUBTITLES_TIMEOUT, 30000),
      minRequestIntervalMs: parseInt(env.OPENSUBTITLES_MIN_INTERVAL_MS, 1000),
    },

    retry: {
      maxAttempts: parseInt(env.RETRY_MAX_ATTEMPTS, DEFAULT_RETRY_POLICY.maxAttempts),
      baseDelayMs: parseInt(env.RETRY_BASE_DELAY_MS, DEFAULT_RETRY_POLICY.baseDelayMs),
      maxDelayMs: parseInt(env.RETRY_MAX_DELAY_MS, DEFAULT_RETRY_POLICY.maxDelayMs),
    },
  };
}

export function validateConfig(config: AppConfig): void {
  if (!config.plex.baseUrl) {
    throw new ConfigurationError('PLEX_URL is required. Set it in .env or pass --plex-url');
  }
  if (!config.plex.apiKey) {
    throw new ConfigurationError('PLEX_TOKEN is required. Set it in .env or pass --plex-token');
  }
  if (config.languages.length === 0) {
    throw new ConfigurationError('At least one subtitle language is required');
  }
  if (config.retry.maxAttempts < 1) {
    throw new ConfigurationError('RETRY_MAX_ATTEMPTS must be at least 1');
  }

  if (config.method === 'local') {
    const { apiKey, username, password } = config.opensubtitles;
    if (!apiKey || !username || !password) {
      throw new ConfigurationError(
        'OpenSubtitles credentials required for local method. Use --method plex for remote operation.'
      );
    }
  }
}
