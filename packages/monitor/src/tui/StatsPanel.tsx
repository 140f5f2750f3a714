import type { Stats } from '@pingscope/shared';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import { type StatSegment, primaryStats, secondaryStats } from './format.js';

function SegmentLine({ segments }: { segments: StatSegment[] }): JSX.Element {
  return (
    <Text>
      {segments.map((segment, i) => (
        <Text key={segment.label}>
          {i > 0 ? '  ' : ''}
          <Text color="gray">{segment.label}:</Text> <Text color={segment.color}>{segment.value}</Text>
        </Text>
      ))}
    </Text>
  );
}

interface StatsPanelProps {
  stats: Stats | undefined;
}

/** Always two lines tall so the grid below keeps its place. */
export function StatsPanel({ stats }: StatsPanelProps): JSX.Element {
  if (!stats || stats.totalSamples === 0) {
    return (
      <Box flexDirection="column">
        <Text color="gray">
          <Spinner type="dots" /> Waiting for data...
        </Text>
        <Text> </Text>
      </Box>
    );
  }

  const secondary = secondaryStats(stats);
  return (
    <Box flexDirection="column">
      <SegmentLine segments={primaryStats(stats)} />
      {secondary.length > 0 ? <SegmentLine segments={secondary} /> : <Text> </Text>}
    </Box>
  );
}
