import { Box, Text } from 'ink';
import type { HostRecord } from '../../ssh-config/host.ts';
import { Header } from './header.tsx';
import { Footer } from './footer.tsx';
import { HostRow } from './host-row.tsx';

export interface PickerViewProps {
  hosts: readonly HostRecord[];
  selected: number | null;
}

export function PickerView({ hosts, selected }: PickerViewProps) {
  return (
    <Box flexDirection="column">
      <Header hostCount={hosts.length} />
      <Box flexDirection="column" flexGrow={1}>
        {hosts.length === 0 ? (
          <Text dimColor>No hosts found.</Text>
        ) : (
          // Identifiers may repeat, so rows are keyed by position.
          hosts.map((host, index) => (
            <HostRow key={index} host={host} index={index} selected={index === selected} />
          ))
        )}
      </Box>
      <Footer />
    </Box>
  );
}
