import type { Sample } from '@pingscope/shared';
import { HEATMAP_CELL, sampleColor } from './palette.js';
import type { Grid } from './viewport.js';

/** A run of adjacent cells sharing a colour; `color` undefined means blank. */
export interface CellRun {
  text: string;
  color: string | undefined;
}

/**
 * Lay samples out row by row, oldest top-left, and merge neighbouring cells
 * of the same colour so each row renders as a handful of text nodes.
 */
export function heatmapRows(samples: readonly Sample[], grid: Grid): CellRun[][] {
  const rows: CellRun[][] = [];
  for (let r = 0; r < grid.rows; r++) {
    const runs: CellRun[] = [];
    for (let c = 0; c < grid.cols; c++) {
      const sample = samples[r * grid.cols + c];
      const color = sample ? sampleColor(sample) : undefined;
      const text = sample ? HEATMAP_CELL : ' ';
      const last = runs[runs.length - 1];
      if (last && last.color === color) {
        last.text += text;
      } else {
        runs.push({ text, color });
      }
    }
    rows.push(runs);
  }
  return rows;
}
