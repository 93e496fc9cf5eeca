/**
 * sshpick entry point.
 *
 * Parses flags, then hands off to the app driver with the real terminal,
 * filesystem and ssh launcher. Errors are printed after the terminal has
 * been restored.
 */

import { loadCliConfig, UsageError, USAGE, type CliConfig } from './config.ts';
import { createLogger } from './logger.ts';
import { runApp } from './app.ts';
import { runInteractiveSession } from './interactive.tsx';
import { readSSHConfig } from '../ssh-config/reader.ts';
import { SSHConfigError } from '../ssh-config/errors.ts';
import { launchSSH } from '../terminal/launcher.ts';

/** Exit status for invalid flags. */
const USAGE_EXIT_CODE = 2;

/** Load the config, or print usage and return null for bad flags. */
function readConfig(argv: string[]): CliConfig | null {
  try {
    return loadCliConfig({ argv, env: process.env });
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`sshpick: ${err.message}`);
      console.error(USAGE);
      return null;
    }
    throw err;
  }
}

export async function main(argv: string[]): Promise<number> {
  const config = readConfig(argv);
  if (!config) {
    return USAGE_EXIT_CODE;
  }

  if (config.help) {
    console.log(USAGE);
    return 0;
  }

  const logger = createLogger('sshpick', { debug: config.debug });

  try {
    return await runApp(config, {
      logger,
      readHosts: readSSHConfig,
      runSession: runInteractiveSession,
      launch: (hostId, binary) => launchSSH(hostId, { binary }),
      stdout: process.stdout,
    });
  } catch (err) {
    if (err instanceof SSHConfigError) {
      console.error(`sshpick: ${err.message}`);
      logger.debug('Exiting on error', { code: err.code });
      return 1;
    }
    console.error('sshpick: unexpected error:', err instanceof Error ? err.message : String(err));
    logger.debug('Unexpected error', { stack: err instanceof Error ? err.stack : undefined });
    return 1;
  }
}
