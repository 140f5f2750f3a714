export interface Percentiles {
  p50: number;
  p90: number;
  p95: number;
  p99: number;
}

/**
 * Point-in-time snapshot of everything the metrics engine tracks.
 * RTT fields stay at 0 until the first successful sample.
 */
export interface Stats {
  totalSamples: number;
  totalTimeouts: number;
  totalSuccess: number;

  lossPercent: number;
  availabilityPercent: number;

  minRttMs: number;
  maxRttMs: number;
  avgRttMs: number;
  stdDevMs: number;
  /** Variance in ms² */
  varianceMs2: number;
  /** Mean absolute difference between consecutive successful RTTs */
  jitterMs: number;
  lastRttMs: number;

  percentiles: Percentiles;

  /** Positive = consecutive successes, negative = consecutive timeouts */
  currentStreak: number;
  longestSuccess: number;
  longestTimeout: number;

  /** Separate runs of consecutive timeouts */
  lossBursts: number;
  brownoutSamples: number;
  /** Transitions into high latency */
  brownoutBursts: number;
  inBrownout: boolean;

  startTime: Date;
  lastSuccessTime?: Date;
  lastTimeoutTime?: Date;
  /** 0 if there has been no timeout */
  timeSinceTimeoutMs: number;
  uptimeSeconds: number;
}

/** Receives every freshly computed snapshot, synchronously. */
export interface StatsSink {
  update(stats: Stats): void;
}

export function emptyPercentiles(): Percentiles {
  return { p50: 0, p90: 0, p95: 0, p99: 0 };
}

export function emptyStats(startTime: Date, uptimeSeconds = 0): Stats {
  return {
    totalSamples: 0,
    totalTimeouts: 0,
    totalSuccess: 0,
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
    currentStreak: 0,
    longestSuccess: 0,
    longestTimeout: 0,
    lossBursts: 0,
    brownoutSamples: 0,
    brownoutBursts: 0,
    inBrownout: false,
    startTime,
    timeSinceTimeoutMs: 0,
    uptimeSeconds,
  };
}
