import { Box, Text } from 'ink';
import { HEATMAP_CELL, LEGEND } from './palette.js';

const KEYS: ReadonlyArray<[string, string]> = [
  ['↑/k', 'Scroll up (older)'],
  ['↓/j', 'Scroll down (newer)'],
  ['PgUp', 'Page up'],
  ['PgDn', 'Page down'],
  ['g', 'Go to oldest'],
  ['G', 'Go to newest'],
  ['c', 'Clear history'],
  ['?/h', 'Toggle help'],
  ['esc', 'Close help'],
  ['q', 'Quit'],
];

export function HelpPanel(): JSX.Element {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor="#5F5FD7" paddingX={2} paddingY={1}>
      <Text bold>Keyboard Shortcuts</Text>
      <Text> </Text>
      {KEYS.map(([key, description]) => (
        <Text key={key}>
          <Text color="#5F5FD7" bold>
            {key.padStart(6)}
          </Text>
          {'  '}
          <Text color="gray">{description}</Text>
        </Text>
      ))}
      <Text> </Text>
      <Text>
        <Text color="gray">Legend: </Text>
        {LEGEND.map((entry) => (
          <Text key={entry.label}>
            <Text color={entry.color}>{HEATMAP_CELL}</Text> {entry.label}{' '}
          </Text>
        ))}
      </Text>
    </Box>
  );
}
