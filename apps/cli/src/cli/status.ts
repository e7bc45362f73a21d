import { Command } from 'commander';
import { OpenSubtitlesClient } from '../clients/OpenSubtitlesClient';
import { PlexClient } from '../clients/PlexClient';
import { StatusCheckService, renderStatus, statusExitCode } from '../services/status-check.service';
import { handleFatalError } from '../utils/errors';
import { setLogLevel } from '../utils/logger';
import { type CliOptions, addConnectionOptions, resolveConfig } from './options';

export function makeStatusCommand(envFile?: string): Command {
  return addConnectionOptions(new Command('status'))
    .description('Check configuration and connectivity without downloading')
    .action(async (options: CliOptions) => {
      try {
        const config = resolveConfig(options);
        setLogLevel(config.logLevel);

        const check = new StatusCheckService({
          config,
          envFile,
          plex: new PlexClient(config.plex),
          opensubtitles: config.method === 'local' ? new OpenSubtitlesClient(config.opensubtitles) : undefined,
        });
        const result = await check.run();

        console.log(`\n${renderStatus(result)}\n`);
        process.exitCode = statusExitCode(result);
      } catch (error) {
        process.exitCode = handleFatalError(error);
      }
    });
}
