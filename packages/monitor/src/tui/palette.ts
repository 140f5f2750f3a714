import type { Sample } from '@pingscope/shared';

/** Upper bounds (inclusive, ms) of each latency band */
export const RTT_THRESHOLDS = {
  excellent: 30,
  good: 80,
  fair: 150,
  poor: 300,
} as const;

export type RttClass = 'excellent' | 'good' | 'fair' | 'poor' | 'bad' | 'timeout';

export const RTT_COLORS: Record<RttClass, string> = {
  excellent: '#00FF00',
  good: '#7FFF00',
  fair: '#FFFF00',
  poor: '#FF8C00',
  bad: '#FF0000',
  timeout: '#8B008B',
};

export const HEATMAP_CELL = '█';

/** Negative values denote a timeout. */
export function classifyMs(ms: number): RttClass {
  if (ms < 0) return 'timeout';
  if (ms <= RTT_THRESHOLDS.excellent) return 'excellent';
  if (ms <= RTT_THRESHOLDS.good) return 'good';
  if (ms <= RTT_THRESHOLDS.fair) return 'fair';
  if (ms <= RTT_THRESHOLDS.poor) return 'poor';
  return 'bad';
}

export function rttColor(ms: number): string {
  return RTT_COLORS[classifyMs(ms)];
}

export function sampleColor(sample: Sample): string {
  return sample.timeout ? RTT_COLORS.timeout : rttColor(sample.rttMs);
}

export function lossColor(lossPercent: number): 'green' | 'yellow' | 'red' {
  if (lossPercent > 5) return 'red';
  if (lossPercent > 0) return 'yellow';
  return 'green';
}

export const LEGEND: ReadonlyArray<{ label: string; color: string }> = [
  { label: `≤${RTT_THRESHOLDS.excellent}ms`, color: RTT_COLORS.excellent },
  { label: `≤${RTT_THRESHOLDS.good}ms`, color: RTT_COLORS.good },
  { label: `≤${RTT_THRESHOLDS.fair}ms`, color: RTT_COLORS.fair },
  { label: `≤${RTT_THRESHOLDS.poor}ms`, color: RTT_COLORS.poor },
  { label: `>${RTT_THRESHOLDS.poor}ms`, color: RTT_COLORS.bad },
  { label: 'timeout', color: RTT_COLORS.timeout },
];
