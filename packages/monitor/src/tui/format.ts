import type { Sample, Stats } from '@pingscope/shared';
import { lossColor, rttColor } from './palette.js';

export interface StatSegment {
  label: string;
  value: string;
  color: string;
}

export function formatMs(ms: number): string {
  return `${ms.toFixed(1)}ms`;
}

function rtt(label: string, ms: number): StatSegment {
  return { label, value: formatMs(ms), color: rttColor(ms) };
}

/** Counts and RTT summary. RTT segments appear once a reply has arrived. */
export function primaryStats(stats: Stats): StatSegment[] {
  const segments: StatSegment[] = [
    { label: 'Sent', value: String(stats.totalSamples), color: 'white' },
    { label: 'Loss', value: `${stats.lossPercent.toFixed(1)}%`, color: lossColor(stats.lossPercent) },
  ];
  if (stats.totalSuccess > 0) {
    segments.push(
      rtt('Min', stats.minRttMs),
      rtt('Avg', stats.avgRttMs),
      rtt('Max', stats.maxRttMs),
      rtt('σ', stats.stdDevMs),
      rtt('Jitter', stats.jitterMs),
    );
  }
  return segments;
}

/** Percentiles and instability indicators */
export function secondaryStats(stats: Stats): StatSegment[] {
  const segments: StatSegment[] = [];
  if (stats.totalSuccess > 0) {
    const { p50, p90, p95, p99 } = stats.percentiles;
    segments.push(rtt('p50', p50), rtt('p90', p90), rtt('p95', p95), rtt('p99', p99));
  }
  if (stats.lossBursts > 0) {
    segments.push({ label: 'Outages', value: String(stats.lossBursts), color: 'red' });
  }
  if (stats.longestTimeout > 0) {
    segments.push({ label: 'MaxDrop', value: String(stats.longestTimeout), color: 'red' });
  }
  if (stats.brownoutBursts > 0) {
    segments.push({ label: 'Brownouts', value: String(stats.brownoutBursts), color: 'yellow' });
  }
  if (stats.currentStreak < -1) {
    segments.push({ label: 'Streak', value: `${stats.currentStreak} timeout`, color: 'red' });
  } else if (stats.inBrownout) {
    segments.push({ label: 'Status', value: 'BROWNOUT', color: 'yellow' });
  }
  return segments;
}

export function segmentsToText(segments: StatSegment[]): string {
  return segments.map((s) => `${s.label}: ${s.value}`).join('  ');
}

/** One line per sample for non-interactive output */
export function formatSampleLine(sample: Sample): string {
  const time = sample.timestamp.toISOString();
  if (sample.timeout) return `${time} timeout`;
  return `${time} seq=${sample.sequence} rtt=${formatMs(sample.rttMs)}`;
}

export function formatStatsLine(stats: Stats): string {
  const parts = [segmentsToText(primaryStats(stats)), segmentsToText(secondaryStats(stats))];
  return parts.filter((part) => part !== '').join('  ');
}
