export interface Grid {
  cols: number;
  rows: number;
}

/** Lines taken by header, two stats lines, heatmap border, status bar and a spare */
const RESERVED_ROWS = 7;
/** Border plus padding on each side */
const RESERVED_COLS = 4;

export function gridDimensions(width: number, height: number): Grid {
  return {
    cols: Math.max(width - RESERVED_COLS, 1),
    rows: Math.max(height - RESERVED_ROWS, 1),
  };
}

export function capacity(grid: Grid): number {
  return grid.cols * grid.rows;
}

/** Largest scroll offset, in samples back from the newest page */
export function maxScroll(total: number, grid: Grid): number {
  return Math.max(total - capacity(grid), 0);
}

/**
 * Inclusive index range of the samples on screen, oldest first, or undefined
 * when there is nothing to show. `scroll` counts samples back from the newest.
 */
export function visibleRange(
  total: number,
  grid: Grid,
  scroll: number,
): { start: number; end: number } | undefined {
  if (total === 0) return undefined;
  const start = Math.max(maxScroll(total, grid) - scroll, 0);
  const end = Math.min(start + capacity(grid), total) - 1;
  return { start, end };
}

export type ScrollAction = 'up' | 'down' | 'pageUp' | 'pageDown' | 'oldest' | 'newest';

/** Up/down move one grid row, page keys one screen. */
export function applyScroll(action: ScrollAction, scroll: number, total: number, grid: Grid): number {
  const limit = maxScroll(total, grid);
  const clamp = (value: number): number => Math.min(Math.max(value, 0), limit);

  switch (action) {
    case 'up':
      return clamp(scroll + grid.cols);
    case 'down':
      return clamp(scroll - grid.cols);
    case 'pageUp':
      return clamp(scroll + capacity(grid));
    case 'pageDown':
      return clamp(scroll - capacity(grid));
    case 'oldest':
      return limit;
    case 'newest':
      return 0;
  }
}
