import type { Stats } from '@pingscope/shared';
import { Counter, Gauge, Registry } from 'prom-client';

const PREFIX = 'pingscope';

type TargetLabel = 'target';

/**
 * Prometheus series for one ping target, fed from engine snapshots.
 *
 * Counters advance by the difference between consecutive snapshots. Latency
 * gauges are left unset until the first successful reply.
 */
export class PingMetrics {
  readonly registry = new Registry();
  private previous = { totalSamples: 0, totalSuccess: 0, totalTimeouts: 0 };

  private readonly sent: Counter<TargetLabel>;
  private readonly success: Counter<TargetLabel>;
  private readonly timeouts: Counter<TargetLabel>;

  private readonly latency: Gauge<TargetLabel | 'stat'>;
  private readonly stdDev: Gauge<TargetLabel>;
  private readonly variance: Gauge<TargetLabel>;
  private readonly jitter: Gauge<TargetLabel>;
  private readonly lastRtt: Gauge<TargetLabel>;
  private readonly p50: Gauge<TargetLabel>;
  private readonly p90: Gauge<TargetLabel>;
  private readonly p95: Gauge<TargetLabel>;
  private readonly p99: Gauge<TargetLabel>;

  private readonly lossPercent: Gauge<TargetLabel>;
  private readonly availabilityPercent: Gauge<TargetLabel>;
  private readonly currentStreak: Gauge<TargetLabel>;
  private readonly longestSuccess: Gauge<TargetLabel>;
  private readonly longestTimeout: Gauge<TargetLabel>;
  private readonly lossBursts: Gauge<TargetLabel>;
  private readonly brownoutSamples: Gauge<TargetLabel>;
  private readonly brownoutBursts: Gauge<TargetLabel>;
  private readonly inBrownout: Gauge<TargetLabel>;
  private readonly uptime: Gauge<TargetLabel>;
  private readonly up: Gauge<TargetLabel>;

  constructor(private readonly target: string) {
    const counter = (name: string, help: string): Counter<TargetLabel> =>
      new Counter<TargetLabel>({ name: `${PREFIX}_${name}`, help, labelNames: ['target'], registers: [this.registry] });
    const gauge = (name: string, help: string): Gauge<TargetLabel> =>
      new Gauge<TargetLabel>({ name: `${PREFIX}_${name}`, help, labelNames: ['target'], registers: [this.registry] });

    this.sent = counter('ping_sent_total', 'Total number of ping packets sent');
    this.success = counter('ping_success_total', 'Total number of successful ping responses');
    this.timeouts = counter('ping_timeout_total', 'Total number of ping timeouts');

    this.latency = new Gauge<TargetLabel | 'stat'>({
      name: `${PREFIX}_ping_latency_ms`,
      help: 'Ping latency in milliseconds (min, avg, max)',
      labelNames: ['target', 'stat'],
      registers: [this.registry],
    });
    this.stdDev = gauge('ping_stddev_ms', 'Standard deviation of ping latency in milliseconds');
    this.variance = gauge('ping_variance_ms2', 'Variance of ping latency in milliseconds squared');
    this.jitter = gauge('ping_jitter_ms', 'Mean absolute difference between consecutive RTTs in milliseconds');
    this.lastRtt = gauge('ping_last_rtt_ms', 'Most recent ping RTT in milliseconds (-1 while timing out)');
    this.p50 = gauge('ping_latency_p50_ms', '50th percentile (median) latency in milliseconds');
    this.p90 = gauge('ping_latency_p90_ms', '90th percentile latency in milliseconds');
    this.p95 = gauge('ping_latency_p95_ms', '95th percentile latency in milliseconds');
    this.p99 = gauge('ping_latency_p99_ms', '99th percentile latency in milliseconds');

    this.lossPercent = gauge('ping_loss_percent', 'Packet loss percentage (0-100)');
    this.availabilityPercent = gauge('ping_availability_percent', 'Availability percentage (0-100)');
    this.currentStreak = gauge('ping_current_streak', 'Current streak (positive=success, negative=timeout)');
    this.longestSuccess = gauge('ping_longest_success_streak', 'Longest consecutive successful pings');
    this.longestTimeout = gauge('ping_longest_timeout_streak', 'Longest consecutive timeout streak');
    this.lossBursts = gauge('ping_loss_bursts_total', 'Number of separate packet loss bursts');
    this.brownoutSamples = gauge('ping_brownout_samples_total', 'Total number of high-latency samples (>200ms)');
    this.brownoutBursts = gauge('ping_brownout_bursts_total', 'Number of transitions into high latency');
    this.inBrownout = gauge('ping_in_brownout', 'Currently in brownout state (1=yes, 0=no)');
    this.uptime = gauge('uptime_seconds', 'Seconds since monitoring started');
    this.up = gauge('ping_up', 'Target is reachable (1=up, 0=down based on the last ping)');
  }

  update(stats: Stats): void {
    const labels = { target: this.target };
    const prev = this.previous;

    if (stats.totalSamples > prev.totalSamples) this.sent.inc(labels, stats.totalSamples - prev.totalSamples);
    if (stats.totalSuccess > prev.totalSuccess) this.success.inc(labels, stats.totalSuccess - prev.totalSuccess);
    if (stats.totalTimeouts > prev.totalTimeouts) {
      this.timeouts.inc(labels, stats.totalTimeouts - prev.totalTimeouts);
    }
    this.previous = {
      totalSamples: stats.totalSamples,
      totalSuccess: stats.totalSuccess,
      totalTimeouts: stats.totalTimeouts,
    };

    this.lossPercent.set(labels, stats.lossPercent);
    this.availabilityPercent.set(labels, stats.availabilityPercent);

    this.currentStreak.set(labels, stats.currentStreak);
    this.longestSuccess.set(labels, stats.longestSuccess);
    this.longestTimeout.set(labels, stats.longestTimeout);

    this.lossBursts.set(labels, stats.lossBursts);
    this.brownoutSamples.set(labels, stats.brownoutSamples);
    this.brownoutBursts.set(labels, stats.brownoutBursts);
    this.inBrownout.set(labels, stats.inBrownout ? 1 : 0);

    this.uptime.set(labels, stats.uptimeSeconds);
    this.up.set(labels, stats.currentStreak > 0 ? 1 : 0);

    if (stats.totalSuccess === 0) return;

    this.latency.set({ ...labels, stat: 'min' }, stats.minRttMs);
    this.latency.set({ ...labels, stat: 'avg' }, stats.avgRttMs);
    this.latency.set({ ...labels, stat: 'max' }, stats.maxRttMs);
    this.stdDev.set(labels, stats.stdDevMs);
    this.variance.set(labels, stats.varianceMs2);
    this.jitter.set(labels, stats.jitterMs);
    this.lastRtt.set(labels, stats.currentStreak > 0 ? stats.lastRttMs : -1);
    this.p50.set(labels, stats.percentiles.p50);
    this.p90.set(labels, stats.percentiles.p90);
    this.p95.set(labels, stats.percentiles.p95);
    this.p99.set(labels, stats.percentiles.p99);
  }

  /** Text exposition of every series */
  async render(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
