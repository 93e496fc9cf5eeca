/**
 * Host record model and its text representations.
 *
 * A record mirrors one `Host` block. Optional attributes are `undefined`
 * when the block does not set them; an empty string is a set value.
 */

export interface HostRecord {
  /** First token after `Host`. Not unique: duplicates are kept in order. */
  hostId: string;
  hostName?: string;
  port?: number;
  user?: string;
  proxyJump?: string;
  localForward?: string;
  identityFile?: string;
  /** View state toggled by the picker. Not part of the record's identity. */
  expanded: boolean;
}

export type HostAttribute = Exclude<keyof HostRecord, 'hostId' | 'expanded'>;

export interface HostAttributeSpec {
  attribute: HostAttribute;
  /** Lower-case directive name, as matched by the parser and used in the text dump. */
  directive: string;
  /** Directive name as written in ssh_config(5). */
  label: string;
}

/** Attributes in text dump order. */
export const HOST_ATTRIBUTES: readonly HostAttributeSpec[] = [
  { attribute: 'hostName', directive: 'hostname', label: 'HostName' },
  { attribute: 'port', directive: 'port', label: 'Port' },
  { attribute: 'user', directive: 'user', label: 'User' },
  { attribute: 'proxyJump', directive: 'proxyjump', label: 'ProxyJump' },
  { attribute: 'localForward', directive: 'localforward', label: 'LocalForward' },
  { attribute: 'identityFile', directive: 'identityfile', label: 'IdentityFile' },
];

/** Attribute order of the expanded picker row. */
const EXPANDED_ORDER: readonly HostAttribute[] = [
  'hostName',
  'port',
  'proxyJump',
  'user',
  'localForward',
  'identityFile',
];

export function createHostRecord(hostId: string, attributes: Partial<Omit<HostRecord, 'hostId'>> = {}): HostRecord {
  return { hostId, expanded: false, ...attributes };
}

function attributeValue(record: HostRecord, attribute: HostAttribute): string | undefined {
  const value = record[attribute];
  return value === undefined ? undefined : String(value);
}

function specFor(attribute: HostAttribute): HostAttributeSpec {
  const spec = HOST_ATTRIBUTES.find((s) => s.attribute === attribute);
  if (!spec) {
    throw new Error(`Unknown host attribute: ${attribute}`);
  }
  return spec;
}

/**
 * Text dump of one record: a `host <id>` line, then every attribute
 * indented by four spaces, with `none` for absent values.
 */
export function formatHostRecord(record: HostRecord): string {
  const lines = [`host ${record.hostId}`];
  for (const { attribute, directive } of HOST_ATTRIBUTES) {
    lines.push(`    ${directive} ${attributeValue(record, attribute) ?? 'none'}`);
  }
  return `${lines.join('\n')}\n`;
}

export function formatHostRecords(records: readonly HostRecord[]): string {
  return records.map(formatHostRecord).join('');
}

export interface SummaryPart {
  icon: string;
  value: string;
}

/** Present fields shown on a collapsed row: hostname, user, port, proxy jump. */
export function summarizeHost(record: HostRecord): SummaryPart[] {
  const parts: Array<SummaryPart | null> = [
    record.hostName !== undefined ? { icon: '🖥️', value: record.hostName } : null,
    record.user !== undefined ? { icon: '👤', value: record.user } : null,
    record.port !== undefined ? { icon: '🚪', value: String(record.port) } : null,
    record.proxyJump !== undefined ? { icon: '↗️', value: record.proxyJump } : null,
  ];
  return parts.filter((p): p is SummaryPart => p !== null);
}

export interface PresentAttribute {
  label: string;
  value: string;
}

/** Present attributes for an expanded row. Absent ones are omitted. */
export function presentAttributes(record: HostRecord): PresentAttribute[] {
  const result: PresentAttribute[] = [];
  for (const attribute of EXPANDED_ORDER) {
    const value = attributeValue(record, attribute);
    if (value !== undefined) {
      result.push({ label: specFor(attribute).label, value });
    }
  }
  return result;
}
