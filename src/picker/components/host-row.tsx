/**
 * One picker row per host.
 *
 * Collapsed: the identifier plus a one-line summary of present fields.
 * Expanded: the identifier, then one line per present attribute.
 * Absent attributes are omitted in both forms.
 */
import { Box, Text } from 'ink';
import { presentAttributes, summarizeHost, type HostRecord } from '../../ssh-config/host.ts';
import { HIGHLIGHT_SYMBOL, rowBackground } from './theme.ts';

export interface HostRowProps {
  host: HostRecord;
  index: number;
  selected: boolean;
}

export function HostRow({ host, index, selected }: HostRowProps) {
  const background = rowBackground(index, selected);
  const marker = selected ? HIGHLIGHT_SYMBOL : ' ';

  if (!host.expanded) {
    const details = summarizeHost(host)
      .map((part) => `${part.icon} ${part.value}`)
      .join('  ');

    return (
      <Text backgroundColor={background} bold={selected}>
        {marker} <Text bold>{host.hostId}</Text>
        {details ? `  ${details}` : ''}
      </Text>
    );
  }

  return (
    <Box flexDirection="column">
      <Text backgroundColor={background} bold={selected}>
        {marker}{' '}
        <Text bold underline>
          {host.hostId}
        </Text>
      </Text>
      {presentAttributes(host).map(({ label, value }) => (
        <Text key={label} backgroundColor={background}>
          {'  '}
          {label} {value}
        </Text>
      ))}
    </Box>
  );
}
