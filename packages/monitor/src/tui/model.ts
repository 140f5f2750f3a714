import type { Sample, Stats } from '@pingscope/shared';
import { RingBuffer } from '../runtime/ring-buffer.js';
import { type Grid, type ScrollAction, applyScroll, maxScroll, visibleRange } from './viewport.js';

export type UiAction =
  | { type: 'quit' }
  | { type: 'toggleHelp' }
  | { type: 'closeHelp' }
  | { type: 'clear' }
  | { type: 'scroll'; action: ScrollAction };

export interface InputKey {
  upArrow: boolean;
  downArrow: boolean;
  pageUp: boolean;
  pageDown: boolean;
  escape: boolean;
}

/** Map a keypress to an action; undefined for unbound keys. */
export function actionForKey(input: string, key: InputKey): UiAction | undefined {
  if (key.escape) return { type: 'closeHelp' };
  if (key.upArrow || input === 'k') return { type: 'scroll', action: 'up' };
  if (key.downArrow || input === 'j') return { type: 'scroll', action: 'down' };
  if (key.pageUp) return { type: 'scroll', action: 'pageUp' };
  if (key.pageDown) return { type: 'scroll', action: 'pageDown' };

  switch (input) {
    case 'q':
      return { type: 'quit' };
    case '?':
    case 'h':
      return { type: 'toggleHelp' };
    case 'c':
      return { type: 'clear' };
    case 'g':
      return { type: 'scroll', action: 'oldest' };
    case 'G':
      return { type: 'scroll', action: 'newest' };
    default:
      return undefined;
  }
}

/**
 * Display state behind the heatmap: a bounded sample history, the latest
 * snapshot, scroll position and the help toggle. Clearing touches only the
 * history; engine totals live elsewhere.
 */
export class HeatmapModel {
  readonly history: RingBuffer<Sample>;
  stats: Stats | undefined;
  scroll = 0;
  showHelp: boolean;
  status = '';

  constructor(historySize: number, showHelp = false) {
    this.history = new RingBuffer<Sample>(historySize);
    this.showHelp = showHelp;
  }

  pushSample(sample: Sample): void {
    this.history.push(sample);
  }

  setStats(stats: Stats): void {
    this.stats = stats;
  }

  /** Returns true when the action asks to quit. */
  apply(action: UiAction, grid: Grid): boolean {
    this.status = '';
    switch (action.type) {
      case 'quit':
        return true;
      case 'toggleHelp':
        this.showHelp = !this.showHelp;
        break;
      case 'closeHelp':
        this.showHelp = false;
        break;
      case 'clear':
        this.history.clear();
        this.scroll = 0;
        this.status = 'Cleared';
        break;
      case 'scroll':
        this.scroll = applyScroll(action.action, this.scroll, this.history.length, grid);
        break;
    }
    return false;
  }

  /** Pull the scroll offset back inside the history after the grid grows. */
  fit(grid: Grid): void {
    this.scroll = Math.min(this.scroll, maxScroll(this.history.length, grid));
  }

  visibleSamples(grid: Grid): Sample[] {
    const scroll = Math.min(this.scroll, maxScroll(this.history.length, grid));
    const range = visibleRange(this.history.length, grid, scroll);
    return range ? this.history.getRange(range.start, range.end) : [];
  }

  canScrollUp(grid: Grid): boolean {
    return this.scroll < maxScroll(this.history.length, grid);
  }

  canScrollDown(): boolean {
    return this.scroll > 0;
  }
}
