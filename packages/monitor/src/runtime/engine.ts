import {
  BROWNOUT_THRESHOLD_MS,
  type Sample,
  type Stats,
  emptyPercentiles,
} from '@pingscope/shared';
import { type LatencyDistribution, PercentileCalculator } from './percentile.js';

export interface MetricsEngineOptions {
  distribution?: LatencyDistribution;
  now?: () => Date;
  brownoutThresholdMs?: number;
}

/** Whole microseconds, the unit variance is accumulated in. */
function toMicros(ms: number): number {
  return Math.round(ms * 1000);
}

/**
 * Running aggregates over an unbounded sample stream.
 *
 * `add` and `stats` are synchronous, so a snapshot always reflects a whole
 * number of samples. Samples must arrive in parser order; streaks and bursts
 * depend on it.
 */
export class MetricsEngine {
  private readonly distribution: LatencyDistribution;
  private readonly now: () => Date;
  private readonly brownoutThresholdMs: number;

  private totalSamples = 0;
  private totalTimeouts = 0;
  private minRttMs = Number.POSITIVE_INFINITY;
  private maxRttMs = 0;
  private sumRttMs = 0;
  /** Sum of RTT² in µs² */
  private sumRttSquaresUs = 0;
  private sumRttUs = 0;
  private lastRttMs: number | undefined;
  private sumJitterMs = 0;
  private jitterCount = 0;
  private currentStreak = 0;
  private longestSuccess = 0;
  private longestTimeout = 0;

  private lossBursts = 0;
  private inTimeoutBurst = false;
  private brownoutSamples = 0;
  private brownoutBursts = 0;
  private inBrownout = false;

  private startTime: Date;
  private lastSuccessTime: Date | undefined;
  private lastTimeoutTime: Date | undefined;

  constructor(options: MetricsEngineOptions = {}) {
    this.distribution = options.distribution ?? new PercentileCalculator();
    this.now = options.now ?? (() => new Date());
    this.brownoutThresholdMs = options.brownoutThresholdMs ?? BROWNOUT_THRESHOLD_MS;
    this.startTime = this.now();
  }

  add(sample: Sample): void {
    this.totalSamples++;

    if (sample.timeout) {
      this.totalTimeouts++;
      this.lastTimeoutTime = sample.timestamp;

      // A burst is a maximal run of timeouts; count it on entry.
      if (!this.inTimeoutBurst) {
        this.lossBursts++;
        this.inTimeoutBurst = true;
      }

      // A timeout is never a brownout sample.
      this.inBrownout = false;

      this.currentStreak = this.currentStreak > 0 ? -1 : this.currentStreak - 1;
      this.longestTimeout = Math.max(this.longestTimeout, -this.currentStreak);
      return;
    }

    const rttMs = sample.rttMs;
    this.lastSuccessTime = sample.timestamp;
    this.inTimeoutBurst = false;

    if (rttMs > this.brownoutThresholdMs) {
      this.brownoutSamples++;
      if (!this.inBrownout) {
        this.brownoutBursts++;
        this.inBrownout = true;
      }
    } else {
      this.inBrownout = false;
    }

    this.minRttMs = Math.min(this.minRttMs, rttMs);
    this.maxRttMs = Math.max(this.maxRttMs, rttMs);
    this.sumRttMs += rttMs;

    const rttUs = toMicros(rttMs);
    this.sumRttUs += rttUs;
    this.sumRttSquaresUs += rttUs * rttUs;

    if (this.lastRttMs !== undefined) {
      this.sumJitterMs += Math.abs(rttMs - this.lastRttMs);
      this.jitterCount++;
    }
    this.lastRttMs = rttMs;

    this.currentStreak = this.currentStreak < 0 ? 1 : this.currentStreak + 1;
    this.longestSuccess = Math.max(this.longestSuccess, this.currentStreak);

    this.distribution.add(rttMs);
  }

  stats(): Stats {
    const now = this.now();
    const totalSuccess = this.totalSamples - this.totalTimeouts;

    const stats: Stats = {
      totalSamples: this.totalSamples,
      totalTimeouts: this.totalTimeouts,
      totalSuccess,
      lossPercent: 0,
      availabilityPercent: 0,
      minRttMs: 0,
      maxRttMs: 0,
      avgRttMs: 0,
      stdDevMs: 0,
      varianceMs2: 0,
      jitterMs: 0,
      lastRttMs: 0,
      percentiles: emptyPercentiles(),
      currentStreak: this.currentStreak,
      longestSuccess: this.longestSuccess,
      longestTimeout: this.longestTimeout,
      lossBursts: this.lossBursts,
      brownoutSamples: this.brownoutSamples,
      brownoutBursts: this.brownoutBursts,
      inBrownout: this.inBrownout,
      startTime: new Date(this.startTime),
      timeSinceTimeoutMs: 0,
      uptimeSeconds: (now.getTime() - this.startTime.getTime()) / 1000,
    };

    if (this.totalSamples > 0) {
      stats.lossPercent = (this.totalTimeouts / this.totalSamples) * 100;
      stats.availabilityPercent = 100 - stats.lossPercent;
    }

    if (totalSuccess > 0) {
      // Var = E[X²] - (E[X])², in µs²
      const meanUs = this.sumRttUs / totalSuccess;
      const varianceUs = Math.max(this.sumRttSquaresUs / totalSuccess - meanUs * meanUs, 0);

      stats.minRttMs = this.minRttMs;
      stats.maxRttMs = this.maxRttMs;
      stats.avgRttMs = this.sumRttMs / totalSuccess;
      stats.stdDevMs = Math.sqrt(varianceUs) / 1000;
      stats.varianceMs2 = varianceUs / 1_000_000;
      stats.lastRttMs = this.lastRttMs ?? 0;
      stats.percentiles = this.distribution.percentiles();
      stats.lastSuccessTime = this.lastSuccessTime;
    }

    if (this.jitterCount > 0) {
      stats.jitterMs = this.sumJitterMs / this.jitterCount;
    }

    if (this.lastTimeoutTime !== undefined) {
      stats.lastTimeoutTime = this.lastTimeoutTime;
      stats.timeSinceTimeoutMs = now.getTime() - this.lastTimeoutTime.getTime();
    }

    return stats;
  }

  /** Back to the initial state, restarting the uptime clock. */
  reset(): void {
    this.totalSamples = 0;
    this.totalTimeouts = 0;
    this.minRttMs = Number.POSITIVE_INFINITY;
    this.maxRttMs = 0;
    this.sumRttMs = 0;
    this.sumRttSquaresUs = 0;
    this.sumRttUs = 0;
    this.lastRttMs = undefined;
    this.sumJitterMs = 0;
    this.jitterCount = 0;
    this.currentStreak = 0;
    this.longestSuccess = 0;
    this.longestTimeout = 0;
    this.lossBursts = 0;
    this.inTimeoutBurst = false;
    this.brownoutSamples = 0;
    this.brownoutBursts = 0;
    this.inBrownout = false;
    this.distribution.reset();
    this.startTime = this.now();
    this.lastSuccessTime = undefined;
    this.lastTimeoutTime = undefined;
  }
}
