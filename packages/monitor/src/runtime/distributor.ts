import type { Sample, Stats, StatsSink } from '@pingscope/shared';
import type { Channel } from './channel.js';
import type { MetricsEngine } from './engine.js';

export interface DistributorOutputs {
  /** Raw samples for the display. Lossy. */
  samples: Channel<Sample>;
  /** Snapshots for the display. Lossy. */
  stats: Channel<Stats>;
}

/**
 * Fans each incoming sample out to the display and the metrics engine.
 *
 * The engine sees every sample in arrival order. The display channels never
 * hold the pipeline back: when a consumer lags, its copy is dropped.
 */
export class Distributor {
  constructor(
    private readonly input: Channel<Sample>,
    private readonly engine: MetricsEngine,
    private readonly outputs: DistributorOutputs,
    private readonly sink?: StatsSink,
  ) {}

  /** Processes one sample and returns the snapshot computed for it. */
  dispatch(sample: Sample): Stats {
    this.outputs.samples.trySend(sample);

    this.engine.add(sample);
    const stats = this.engine.stats();

    this.outputs.stats.trySend(stats);
    this.sink?.update(stats);
    return stats;
  }

  /** Runs until the input is drained or `signal` aborts, then closes both outputs. */
  async run(signal?: AbortSignal): Promise<void> {
    try {
      for (;;) {
        const next = await this.input.receive(signal);
        if (next.done) return;
        this.dispatch(next.value);
      }
    } finally {
      this.outputs.samples.close();
      this.outputs.stats.close();
    }
  }
}
