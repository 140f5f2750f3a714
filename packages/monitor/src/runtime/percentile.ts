import type { Percentiles } from '@pingscope/shared';

/**
 * Latency observations in milliseconds with percentile queries.
 * The engine only talks to this interface, so a bounded structure
 * (reservoir, t-digest) can replace the exact calculator.
 */
export interface LatencyDistribution {
  add(valueMs: number): void;
  /** `p` in [0, 100]. Returns 0 when there is no data. */
  percentile(p: number): number;
  percentiles(): Percentiles;
  count(): number;
  reset(): void;
}

/**
 * Exact percentiles over every observation, interpolating linearly between
 * order statistics. Inserts append; the array is sorted lazily on the first
 * query after a batch of inserts. Memory grows with every observation.
 */
export class PercentileCalculator implements LatencyDistribution {
  private values: number[] = [];
  private sorted = true;

  add(valueMs: number): void {
    this.values.push(valueMs);
    this.sorted = false;
  }

  count(): number {
    return this.values.length;
  }

  reset(): void {
    this.values = [];
    this.sorted = true;
  }

  percentile(p: number): number {
    const n = this.values.length;
    if (n === 0) return 0;

    this.ensureSorted();

    const first = this.values[0] ?? 0;
    const last = this.values[n - 1] ?? 0;
    if (p <= 0) return first;
    if (p >= 100) return last;

    const rank = (p / 100) * (n - 1);
    const lower = Math.floor(rank);
    const upper = lower + 1;
    if (upper >= n) return last;

    const lo = this.values[lower] ?? last;
    const hi = this.values[upper] ?? last;
    return lo + (rank - lower) * (hi - lo);
  }

  percentiles(): Percentiles {
    return {
      p50: this.percentile(50),
      p90: this.percentile(90),
      p95: this.percentile(95),
      p99: this.percentile(99),
    };
  }

  private ensureSorted(): void {
    if (!this.sorted) {
      this.values.sort((a, b) => a - b);
      this.sorted = true;
    }
  }
}
