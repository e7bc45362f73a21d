#!/usr/bin/env node
/**
 * subtitle-sync: fills in missing subtitles for Plex libraries, either by
 * writing .srt files from OpenSubtitles next to the media or by letting the
 * Plex server's own agent fetch them.
 */

import path from 'path';
import dotenv from 'dotenv';
import { Command } from 'commander';
import { makeDownloadCommand } from './cli/download';
import { makeStatusCommand } from './cli/status';
import { handleFatalError } from './utils/errors';
import { logger } from './utils/logger';

const envResult = dotenv.config();
if (envResult.error) {
  logger.debug(`No .env file loaded: ${envResult.error.message}`);
}
const envFile = envResult.error ? undefined : path.resolve('.env');

const program = new Command();

program
  .name('subtitle-sync')
  .description('Download missing subtitles for Plex libraries')
  .version('1.0.0');

program.addCommand(makeDownloadCommand(), { isDefault: true });
program.addCommand(makeStatusCommand(envFile));

program.parseAsync(process.argv).catch((error: unknown) => {
  process.exitCode = handleFatalError(error);
});
