/**
 * Parse SSH config text into host records.
 *
 * Handles Host/HostName/Port/User/ProxyJump/LocalForward/IdentityFile.
 * Unlike a lenient importer, any other directive is rejected with the
 * offending line number, and parsing is all-or-nothing.
 */

import { createHostRecord, HOST_ATTRIBUTES, type HostAttribute, type HostRecord } from './host.ts';
import { ParseError } from './errors.ts';

export type ParseResult = { ok: true; hosts: HostRecord[] } | { ok: false; error: ParseError };

/** `Host` is matched literally, including its case and the following space. */
const HOST_PREFIX = 'Host ';

/** Largest value an unsigned 32-bit port field holds. */
const MAX_PORT_VALUE = 4_294_967_295;

const DIRECTIVES = new Map<string, HostAttribute>(
  HOST_ATTRIBUTES.map((spec) => [spec.directive, spec.attribute]),
);

/**
 * Parse a port value. Returns undefined for anything that is not an
 * unsigned decimal integer; such values are dropped, not reported.
 */
export function parsePort(value: string): number | undefined {
  if (!/^\+?\d+$/.test(value)) return undefined;
  const port = Number(value);
  return port <= MAX_PORT_VALUE ? port : undefined;
}

/** Split a setting line into key and value on the first whitespace run. */
function splitSetting(line: string): [string, string] | null {
  const match = line.match(/^(\S+)\s+(.+)$/s);
  if (!match) return null;
  return [match[1], match[2]];
}

function assign(host: HostRecord, attribute: HostAttribute, value: string): void {
  switch (attribute) {
    case 'port':
      host.port = parsePort(value);
      break;
    case 'hostName':
      host.hostName = value;
      break;
    case 'user':
      host.user = value;
      break;
    case 'proxyJump':
      host.proxyJump = value;
      break;
    case 'localForward':
      host.localForward = value;
      break;
    case 'identityFile':
      host.identityFile = value;
      break;
  }
}

/**
 * Parse SSH config text (contents of ~/.ssh/config) into host records,
 * in file order.
 */
export function parseSSHConfig(configText: string): ParseResult {
  const lines = configText.split('\n');
  const hosts: HostRecord[] = [];
  let current: HostRecord | null = null;

  for (const [index, rawLine] of lines.entries()) {
    const lineNumber = index + 1;
    const line = rawLine.trim();

    // Skip empty lines and comments
    if (!line || line.startsWith('#')) continue;

    if (line.startsWith(HOST_PREFIX)) {
      if (current) {
        hosts.push(current);
      }
      // The line is trimmed, so at least one pattern follows the prefix.
      // Extra patterns are not modelled as aliases.
      const [hostId] = line.slice(HOST_PREFIX.length).trim().split(/\s+/);
      current = createHostRecord(hostId);
      continue;
    }

    if (!current) {
      return { ok: false, error: new ParseError(lineNumber, 'Setting outside of Host block') };
    }

    const setting = splitSetting(line);
    const attribute = setting ? DIRECTIVES.get(setting[0].toLowerCase()) : undefined;
    if (!setting || !attribute) {
      return { ok: false, error: new ParseError(lineNumber, 'Invalid config line format') };
    }

    // Last write wins within a block.
    assign(current, attribute, setting[1]);
  }

  if (current) {
    hosts.push(current);
  }

  return { ok: true, hosts };
}

/** Like {@link parseSSHConfig}, but throws the {@link ParseError}. */
export function parseSSHConfigOrThrow(configText: string): HostRecord[] {
  const result = parseSSHConfig(configText);
  if (!result.ok) {
    throw result.error;
  }
  return result.hosts;
}
