/**
 * File-reading collaborator for the parser.
 *
 * The file is read once, synchronously, before any interactive state
 * exists. Filesystem failures surface as {@link IoError}; malformed text
 * as {@link ParseError}.
 */

import { readFileSync } from 'node:fs';
import { IoError } from './errors.ts';
import type { HostRecord } from './host.ts';
import { parseSSHConfigOrThrow } from './parser.ts';

export function readConfigText(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    throw new IoError(path, err instanceof Error ? err : new Error(String(err)));
  }
}

export function readSSHConfig(path: string): HostRecord[] {
  return parseSSHConfigOrThrow(readConfigText(path));
}
