import type { Sample } from '@pingscope/shared';
import { Box, Text } from 'ink';
import { heatmapRows } from './rows.js';
import type { Grid } from './viewport.js';

interface HeatmapProps {
  samples: Sample[];
  grid: Grid;
}

export function Heatmap({ samples, grid }: HeatmapProps): JSX.Element {
  const rows = heatmapRows(samples, grid);

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="#444444" paddingX={1}>
      {rows.map((runs, r) => (
        <Text key={r}>
          {runs.map((run, i) => (
            <Text key={i} color={run.color}>
              {run.text}
            </Text>
          ))}
        </Text>
      ))}
    </Box>
  );
}
