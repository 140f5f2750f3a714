import { Box, Text } from 'ink';

interface StatusBarProps {
  width: number;
  message: string;
  scroll: number;
  scrollable: boolean;
}

export function StatusBar({ width, message, scroll, scrollable }: StatusBarProps): JSX.Element {
  let left = message;
  if (left === '' && scrollable) {
    left = scroll > 0 ? `Scroll: -${scroll} samples` : 'Newest';
  }

  return (
    <Box width={width} justifyContent="space-between">
      <Text color="gray">{left}</Text>
      <Text color="gray">Press ? for help</Text>
    </Box>
  );
}
