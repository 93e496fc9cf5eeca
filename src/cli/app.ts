/**
 * Application driver: read the config, run the picker, launch ssh.
 *
 * Collaborators are injected so the flow can run without a terminal.
 */

import type { CliConfig } from './config.ts';
import type { Logger } from './logger.ts';
import { formatHostRecords, type HostRecord } from '../ssh-config/host.ts';
import { NoSelectionError } from '../ssh-config/errors.ts';
import { filterHosts } from '../picker/filter.ts';
import { SelectionModel } from '../picker/selection.ts';
import type { SessionOutcome } from '../picker/session.ts';

/** Exit status after Ctrl+C (128 + SIGINT). */
export const INTERRUPT_EXIT_CODE = 130;

export interface AppDeps {
  logger: Logger;
  readHosts: (path: string) => HostRecord[];
  runSession: (model: SelectionModel) => Promise<SessionOutcome>;
  launch: (hostId: string, sshBinary: string) => Promise<number>;
  stdout: { write(chunk: string): unknown };
}

/**
 * Run one picker session and return the process exit status.
 * Read, parse and selection failures are thrown.
 */
export async function runApp(config: CliConfig, deps: AppDeps): Promise<number> {
  const { logger } = deps;

  const allHosts = deps.readHosts(config.configPath);
  const hosts = config.filter === undefined ? allHosts : filterHosts(allHosts, config.filter);
  logger.debug('Loaded ssh config', {
    path: config.configPath,
    hosts: allHosts.length,
    listed: hosts.length,
  });

  if (config.dump) {
    deps.stdout.write(formatHostRecords(hosts));
    return 0;
  }

  logger.debug(`Parsed hosts:\n${formatHostRecords(hosts)}`);

  const outcome = await deps.runSession(new SelectionModel(hosts));

  switch (outcome.status) {
    case 'confirmed':
      logger.debug('Launching ssh', { host: outcome.hostId, binary: config.sshBinary });
      return deps.launch(outcome.hostId, config.sshBinary);
    case 'aborted':
      logger.debug('Picker closed without a selection', { reason: outcome.reason });
      return outcome.reason === 'interrupt' ? INTERRUPT_EXIT_CODE : 0;
    case 'no-selection':
      throw new NoSelectionError();
  }
}
