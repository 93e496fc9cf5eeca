/**
 * Hands the terminal to an interactive ssh session.
 *
 * Node cannot replace its own process image, so ssh runs as a child that
 * inherits stdio, and its exit status becomes ours.
 */

import { spawn } from 'node:child_process';
import { constants } from 'node:os';

export interface LaunchOptions {
  /** ssh binary to run. Defaults to `ssh` on PATH. */
  binary?: string;
}

/** Exit status for a child killed by `signal`, shell-style. */
export function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return 128 + (entry ? entry[1] : 0);
}

/** Run `ssh -t <hostId>` and resolve to its exit status. */
export function launchSSH(hostId: string, options: LaunchOptions = {}): Promise<number> {
  const binary = options.binary ?? 'ssh';

  return new Promise((resolve, reject) => {
    const child = spawn(binary, ['-t', hostId], { stdio: 'inherit' });

    child.once('error', (err) => {
      reject(new Error(`Failed to start ${binary}: ${err.message}`));
    });

    child.once('exit', (code, signal) => {
      if (code !== null) {
        resolve(code);
      } else if (signal) {
        resolve(signalExitCode(signal));
      } else {
        resolve(1);
      }
    });
  });
}
