import fs from 'fs';
import path from 'path';
import type { OpenSubtitlesApi } from '../clients/OpenSubtitlesClient';
import type { PlexApi } from '../clients/PlexClient';
import type { AppConfig } from '../config/services.config';
import type { PlexLibrary } from '../types/plex.types';
import {
  ConfigurationError,
  ConnectionError,
  RateLimitedError,
  ServiceError,
  errorMessage,
} from '../utils/errors';
import { logger } from '../utils/logger';

export interface StatusResult {
  info: string[];
  warnings: string[];
  issues: string[];
}

export interface StatusCheckDeps {
  config: AppConfig;
  plex: Pick<PlexApi, 'getServerInfo' | 'getLibraries' | 'getLibraryItems' | 'getAllLeaves'>;
  /** Required for the local method only. */
  opensubtitles?: Pick<OpenSubtitlesApi, 'probe' | 'login' | 'getUserInfo'>;
  /** Path of the .env file the configuration was read from, if any. */
  envFile?: string;
}

const RULE = '='.repeat(80);

export function maskSecret(secret: string): string {
  return `${'*'.repeat(20)}...${secret.slice(-4)}`;
}

async function directoryExists(directory: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(directory);
    return stat.isDirectory();
  } catch (error) {
    logger.debug(`Cannot stat ${directory}: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Verifies configuration and connectivity without downloading anything.
 * Problems land in `issues` (fatal) or `warnings`; everything else is `info`.
 */
export class StatusCheckService {
  private readonly deps: StatusCheckDeps;
  private result: StatusResult = { info: [], warnings: [], issues: [] };

  constructor(deps: StatusCheckDeps) {
    this.deps = deps;
  }

  async run(): Promise<StatusResult> {
    this.result = { info: [], warnings: [], issues: [] };
    const { config } = this.deps;

    this.checkSettings();

    if (config.plex.baseUrl && config.plex.apiKey) {
      await this.checkPlex();
    }

    if (config.method === 'local') {
      const { apiKey, username, password } = config.opensubtitles;
      if (apiKey) {
        await this.checkApiKey();
        if (username && password) {
          await this.checkLogin(username);
        }
      }
    }

    return this.result;
  }

  private checkSettings(): void {
    const { config, envFile } = this.deps;
    const { info, warnings, issues } = this.result;

    if (envFile) {
      info.push(`✓ .env file found at: ${path.resolve(envFile)}`);
    } else {
      warnings.push('⚠ .env file not found (using command-line args or system env vars)');
    }

    info.push(`✓ Download method: ${config.method}`);

    if (config.plex.baseUrl) {
      info.push(`✓ PLEX_URL: ${config.plex.baseUrl}`);
    } else {
      issues.push('✗ PLEX_URL is not set');
    }
    if (config.plex.apiKey) {
      info.push(`✓ PLEX_TOKEN: ${maskSecret(config.plex.apiKey)}`);
    } else {
      issues.push('✗ PLEX_TOKEN is not set');
    }

    if (config.method === 'local') {
      const { apiKey, username, password } = config.opensubtitles;
      if (apiKey) {
        info.push(`✓ OPENSUBTITLES_API_KEY: ${maskSecret(apiKey)}`);
      } else {
        issues.push('✗ OPENSUBTITLES_API_KEY is not set (required for local method)');
      }
      if (username) {
        info.push(`✓ OPENSUBTITLES_USERNAME: ${username}`);
      } else {
        issues.push('✗ OPENSUBTITLES_USERNAME is not set (required for local method)');
      }
      if (password) {
        info.push(`✓ OPENSUBTITLES_PASSWORD: ${'*'.repeat(password.length)}`);
      } else {
        issues.push('✗ OPENSUBTITLES_PASSWORD is not set (required for local method)');
      }
    }

    if (config.languages.length > 0) {
      info.push(`✓ SUBTITLE_LANGUAGES: ${config.languages.join(', ')}`);
      for (const language of config.languages) {
        if (language.length !== 2) {
          warnings.push(`⚠ Language code '${language}' should be 2 letters (ISO 639-1)`);
        }
      }
    } else {
      warnings.push("⚠ SUBTITLE_LANGUAGES not set, defaulting to 'en'");
    }
  }

  private async checkPlex(): Promise<void> {
    const { plex, config } = this.deps;
    const { info, warnings, issues } = this.result;

    try {
      const server = await plex.getServerInfo();
      info.push(`✓ Connected to Plex server: ${server.friendlyName}`);
      info.push(`  Version: ${server.version}`);
      info.push(`  Platform: ${server.platform}`);

      const libraries = await plex.getLibraries();
      const movieLibraries = libraries.filter((library) => library.type === 'movie');
      const showLibraries = libraries.filter((library) => library.type === 'show');

      if (movieLibraries.length === 0 && showLibraries.length === 0) {
        warnings.push('⚠ No movie or TV show libraries found');
        return;
      }

      info.push(
        `✓ Found ${movieLibraries.length} movie and ${showLibraries.length} TV show libraries:`
      );
      for (const library of movieLibraries) {
        const items = await plex.getLibraryItems(library.key);
        info.push(`  - ${library.title} (Movies): ${items.length} items`);
      }
      for (const library of showLibraries) {
        const shows = await plex.getLibraryItems(library.key);
        info.push(`  - ${library.title} (TV Shows): ${shows.length} shows`);
      }

      if (config.method === 'local') {
        await this.checkWritePermission(movieLibraries[0] ?? showLibraries[0]);
      } else {
        info.push('ℹ Skipping filesystem write check (using Plex download method)');
      }
    } catch (error) {
      issues.push(`✗ Failed to connect to Plex: ${errorMessage(error)}`);
    }
  }

  private async samplePath(library: PlexLibrary): Promise<string | undefined> {
    const { plex } = this.deps;
    const items = await plex.getLibraryItems(library.key);
    const first = items[0];
    if (!first) return undefined;

    const playable = library.type === 'show' ? (await plex.getAllLeaves(first.ratingKey))[0] : first;
    return playable?.Media?.[0]?.Part?.[0]?.file;
  }

  private async checkWritePermission(library: PlexLibrary | undefined): Promise<void> {
    const { info, warnings, issues } = this.result;
    if (!library) return;

    const mediaPath = await this.samplePath(library);
    if (!mediaPath) return;

    const directory = path.dirname(mediaPath);
    if (!(await directoryExists(directory))) {
      warnings.push(`⚠ Media directory not accessible: ${directory}`);
      info.push('  → Consider using --method plex for remote downloads');
      return;
    }

    const probe = path.join(directory, '.subtitle_sync_test');
    try {
      await fs.promises.writeFile(probe, '');
      await fs.promises.unlink(probe);
      info.push(`✓ Write permissions OK in: ${directory}`);
    } catch (error) {
      if (error instanceof Error && 'code' in error && (error.code === 'EACCES' || error.code === 'EPERM')) {
        issues.push(`✗ No write permission in: ${directory}`);
      } else {
        warnings.push(`⚠ Could not test write permissions: ${errorMessage(error)}`);
      }
    }
  }

  private async checkApiKey(): Promise<void> {
    const { opensubtitles } = this.deps;
    const { info } = this.result;
    if (!opensubtitles) return;

    try {
      const rateLimit = await opensubtitles.probe();
      info.push('✓ OpenSubtitles API key is valid');
      if (rateLimit.remaining !== undefined) {
        info.push(`  Rate limit: ${rateLimit.remaining}/${rateLimit.limit ?? 'unknown'} requests remaining`);
      }
    } catch (error) {
      this.recordRemoteFailure(error, {
        unauthorized: '✗ OpenSubtitles API key is invalid',
        rateLimited: '⚠ Rate limit exceeded - wait before making more requests',
        unreachable: 'Failed to connect to OpenSubtitles API',
      });
    }
  }

  private async checkLogin(username: string): Promise<void> {
    const { opensubtitles } = this.deps;
    const { info } = this.result;
    if (!opensubtitles) return;

    try {
      const user = await opensubtitles.login();
      info.push(`✓ Successfully logged in as: ${username}`);
      if (user) {
        info.push(`  Account level: ${user.level ?? 'unknown'}`);
        info.push(`  Daily download limit: ${user.allowed_downloads ?? 'unknown'}`);
      }

      const quota = await opensubtitles.getUserInfo();
      if (quota.remaining_downloads !== undefined) {
        info.push(`  Downloads remaining today: ${quota.remaining_downloads}`);
      }
    } catch (error) {
      this.recordRemoteFailure(error, {
        unauthorized: '✗ Invalid username or password',
        rateLimited: '⚠ Rate limit exceeded for login attempts',
        unreachable: 'Failed to login',
      });
    }
  }

  private recordRemoteFailure(
    error: unknown,
    messages: { unauthorized: string; rateLimited: string; unreachable: string }
  ): void {
    const { warnings, issues } = this.result;

    if (error instanceof ConfigurationError) {
      issues.push(messages.unauthorized);
    } else if (error instanceof RateLimitedError) {
      warnings.push(messages.rateLimited);
    } else if (error instanceof ConnectionError) {
      issues.push(`✗ ${messages.unreachable}: ${error.message}`);
    } else if (error instanceof ServiceError) {
      warnings.push(`⚠ Unexpected API response: ${error.statusCode}`);
    } else {
      issues.push(`✗ ${messages.unreachable}: ${errorMessage(error)}`);
    }
  }
}

export function renderStatus(result: StatusResult): string {
  const lines: string[] = [RULE, 'STATUS CHECK RESULTS', RULE, ''];

  const section = (title: string, entries: string[]) => {
    if (entries.length === 0) return;
    lines.push(`${title}:`);
    for (const entry of entries) {
      lines.push(`  ${entry}`);
    }
    lines.push('');
  };

  section('Information', result.info);
  section('Warnings', result.warnings);
  section('Issues (must be resolved)', result.issues);

  lines.push(RULE);
  if (result.issues.length === 0) {
    lines.push('✓ STATUS: READY TO DOWNLOAD SUBTITLES', RULE, '');
    lines.push("Run 'subtitle-sync download' to start downloading subtitles.");
  } else {
    lines.push('✗ STATUS: CONFIGURATION ISSUES FOUND', RULE, '');
    lines.push('Please fix the issues above before running a download.');
    lines.push('Check your .env file or command-line arguments.');
  }

  return lines.join('\n');
}

export function statusExitCode(result: StatusResult): number {
  return result.issues.length === 0 ? 0 : 1;
}
