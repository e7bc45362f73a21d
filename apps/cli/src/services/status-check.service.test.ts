import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../config/services.config';
import { ConfigurationError, ConnectionError, RateLimitedError } from '../utils/errors';
import { fakePlexApi, plexItem } from '../test-utils/fixtures';
import { StatusCheckService, maskSecret, renderStatus, statusExitCode } from './status-check.service';

const RULE = '='.repeat(80);

const localEnv = {
  PLEX_TOKEN: 'test-token-1234',
  OPENSUBTITLES_API_KEY: 'test-api-key',
  OPENSUBTITLES_USERNAME: 'tester',
  OPENSUBTITLES_PASSWORD: 'test-secret',
};

describe('maskSecret', () => {
  it('should keep only the last four characters', () => {
    expect(maskSecret('test-token-1234')).toBe('********************...1234');
  });
});

describe('StatusCheckService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'status-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should report a healthy Plex-method setup', async () => {
    const check = new StatusCheckService({
      config: loadConfig({ PLEX_TOKEN: 'test-token-1234', SUBTITLE_METHOD: 'plex' }),
      envFile: '/srv/subtitle-sync/.env',
      plex: fakePlexApi({ getLibraryItems: vi.fn().mockResolvedValue([plexItem()]) }),
    });

    const result = await check.run();

    expect(result).toEqual({
      info: [
        '✓ .env file found at: /srv/subtitle-sync/.env',
        '✓ Download method: plex',
        '✓ PLEX_URL: http://localhost:32400',
        '✓ PLEX_TOKEN: ********************...1234',
        '✓ SUBTITLE_LANGUAGES: en',
        '✓ Connected to Plex server: Home',
        '  Version: 1.40.0',
        '  Platform: Linux',
        '✓ Found 1 movie and 1 TV show libraries:',
        '  - Movies (Movies): 1 items',
        '  - TV Shows (TV Shows): 1 shows',
        'ℹ Skipping filesystem write check (using Plex download method)',
      ],
      warnings: [],
      issues: [],
    });
    expect(statusExitCode(result)).toBe(0);
  });

  it('should flag missing OpenSubtitles credentials for the local method', async () => {
    const check = new StatusCheckService({
      config: loadConfig({ PLEX_TOKEN: 'test-token-1234' }),
      plex: fakePlexApi({
        getLibraryItems: vi.fn().mockResolvedValue([plexItem({}, [], '/nonexistent/movies/Heat/Heat.mkv')]),
      }),
    });

    const result = await check.run();

    expect(result.issues).toEqual([
      '✗ OPENSUBTITLES_API_KEY is not set (required for local method)',
      '✗ OPENSUBTITLES_USERNAME is not set (required for local method)',
      '✗ OPENSUBTITLES_PASSWORD is not set (required for local method)',
    ]);
    expect(result.warnings).toEqual([
      '⚠ .env file not found (using command-line args or system env vars)',
      '⚠ Media directory not accessible: /nonexistent/movies/Heat',
    ]);
    expect(statusExitCode(result)).toBe(1);
  });

  it('should probe write access, the API key and the account', async () => {
    const check = new StatusCheckService({
      config: loadConfig(localEnv),
      envFile: '.env',
      plex: fakePlexApi({
        getLibraryItems: vi.fn().mockResolvedValue([plexItem({}, [], path.join(dir, 'Heat.mkv'))]),
      }),
      opensubtitles: {
        probe: vi.fn().mockResolvedValue({ remaining: '39', limit: '40' }),
        login: vi.fn().mockResolvedValue({ level: 'Sub leecher', allowed_downloads: 20 }),
        getUserInfo: vi.fn().mockResolvedValue({ remaining_downloads: 18 }),
      },
    });

    const result = await check.run();

    expect(result.info).toContain('✓ OPENSUBTITLES_PASSWORD: ***********');
    expect(result.info.slice(-7)).toEqual([
      `✓ Write permissions OK in: ${dir}`,
      '✓ OpenSubtitles API key is valid',
      '  Rate limit: 39/40 requests remaining',
      '✓ Successfully logged in as: tester',
      '  Account level: Sub leecher',
      '  Daily download limit: 20',
      '  Downloads remaining today: 18',
    ]);
    expect(result.issues).toEqual([]);
    expect(await fs.promises.readdir(dir)).toEqual([]);
  });

  it('should classify OpenSubtitles failures', async () => {
    const check = new StatusCheckService({
      config: loadConfig(localEnv),
      envFile: '.env',
      plex: fakePlexApi({ getLibraries: vi.fn().mockResolvedValue([]) }),
      opensubtitles: {
        probe: vi.fn().mockRejectedValue(new RateLimitedError('Rate limit exceeded', 'opensubtitles')),
        login: vi.fn().mockRejectedValue(new ConfigurationError('Invalid OpenSubtitles username or password')),
        getUserInfo: vi.fn(),
      },
    });

    const result = await check.run();

    expect(result.warnings).toEqual([
      '⚠ No movie or TV show libraries found',
      '⚠ Rate limit exceeded - wait before making more requests',
    ]);
    expect(result.issues).toEqual(['✗ Invalid username or password']);
  });

  it('should report an unreachable Plex server as an issue', async () => {
    const check = new StatusCheckService({
      config: loadConfig({ PLEX_TOKEN: 'test-token-1234', SUBTITLE_METHOD: 'plex' }),
      envFile: '.env',
      plex: fakePlexApi({
        getServerInfo: vi.fn().mockRejectedValue(new ConnectionError('Cannot reach plex (ECONNREFUSED)', 'plex')),
      }),
    });

    const result = await check.run();

    expect(result.issues).toEqual(['✗ Failed to connect to Plex: Cannot reach plex (ECONNREFUSED)']);
  });

  it('should warn about language codes that are not two letters', async () => {
    const config = loadConfig({ PLEX_TOKEN: 'test-token-1234', SUBTITLE_METHOD: 'plex' });
    config.languages = ['en', 'pt-br'];
    const check = new StatusCheckService({ config, envFile: '.env', plex: fakePlexApi() });

    const result = await check.run();

    expect(result.warnings).toEqual(["⚠ Language code 'pt-br' should be 2 letters (ISO 639-1)"]);
  });
});

describe('renderStatus', () => {
  it('should render a ready status', () => {
    expect(renderStatus({ info: ['✓ Download method: plex'], warnings: [], issues: [] })).toBe(
      [
        RULE,
        'STATUS CHECK RESULTS',
        RULE,
        '',
        'Information:',
        '  ✓ Download method: plex',
        '',
        RULE,
        '✓ STATUS: READY TO DOWNLOAD SUBTITLES',
        RULE,
        '',
        "Run 'subtitle-sync download' to start downloading subtitles.",
      ].join('\n')
    );
  });

  it('should list issues that block a download', () => {
    const text = renderStatus({ info: [], warnings: ['⚠ w'], issues: ['✗ PLEX_TOKEN is not set'] });

    expect(text.split('\n').slice(4)).toEqual([
      'Warnings:',
      '  ⚠ w',
      '',
      'Issues (must be resolved):',
      '  ✗ PLEX_TOKEN is not set',
      '',
      RULE,
      '✗ STATUS: CONFIGURATION ISSUES FOUND',
      RULE,
      '',
      'Please fix the issues above before running a download.',
      'Check your .env file or command-line arguments.',
    ]);
  });
});
