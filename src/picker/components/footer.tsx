import { Box, Text } from 'ink';

export const FOOTER_HELP = 'Use ↓↑ to move, ← to unselect, → to change status, g/G to go top/bottom.';

export function Footer() {
  return (
    <Box borderStyle="single" borderBottom={false} borderLeft={false} borderRight={false} justifyContent="center">
      <Text>{FOOTER_HELP}</Text>
    </Box>
  );
}
