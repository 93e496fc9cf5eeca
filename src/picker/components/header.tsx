import { Box, Text } from 'ink';
import { TITLE_COLOR } from './theme.ts';

export interface HeaderProps {
  hostCount: number;
}

export function Header({ hostCount }: HeaderProps) {
  return (
    <Box borderStyle="single" paddingX={1}>
      <Text color={TITLE_COLOR}>Your ssh configs</Text>
      <Text dimColor> ({hostCount})</Text>
    </Box>
  );
}
