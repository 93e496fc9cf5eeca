/**
 * Write host records back out as SSH config text.
 */

import { HOST_ATTRIBUTES, type HostRecord } from './host.ts';

const INDENT = '    ';

export function serializeHostRecord(record: HostRecord): string {
  const lines = [`Host ${record.hostId}`];
  for (const { attribute, label } of HOST_ATTRIBUTES) {
    const value = record[attribute];
    if (value !== undefined) {
      lines.push(`${INDENT}${label} ${value}`);
    }
  }
  return lines.join('\n');
}

/** Blocks separated by a blank line, with a trailing newline when non-empty. */
export function serializeSSHConfig(records: readonly HostRecord[]): string {
  if (records.length === 0) return '';
  return `${records.map(serializeHostRecord).join('\n\n')}\n`;
}
