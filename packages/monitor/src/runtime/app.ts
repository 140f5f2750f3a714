import {
  type Logger,
  type MonitorConfig,
  SHUTDOWN_TIMEOUT_MS,
  type Sample,
  type Stats,
  type StatsSink,
  silentLogger,
} from '@pingscope/shared';
import { Channel } from './channel.js';
import { Distributor } from './distributor.js';
import { MetricsEngine } from './engine.js';
import { TimeoutError, whenAborted, withTimeout } from './timeout.js';

/** Produces samples until the signal aborts */
export interface SampleSource {
  run(samples: Channel<Sample>, signal: AbortSignal): Promise<void>;
}

/** Receives every snapshot and serves it until the signal aborts */
export interface MetricsServer extends StatsSink {
  start(signal: AbortSignal): Promise<void>;
}

export interface UiHandle {
  /** Settles when the user quits or after `unmount` */
  waitUntilExit(): Promise<void>;
  unmount(): void;
}

export interface UiInput {
  config: MonitorConfig;
  samples: Channel<Sample>;
  stats: Channel<Stats>;
}

export type UiFactory = (input: UiInput) => UiHandle;

export interface AppDeps {
  runner: SampleSource;
  ui: UiFactory;
  exporter?: MetricsServer;
  engine?: MetricsEngine;
  logger?: Logger;
  /** Bound on each shutdown wait */
  shutdownTimeoutMs?: number;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function wrap(component: string, value: unknown): Error {
  const error = toError(value);
  return new Error(`${component}: ${error.message}`, { cause: error });
}

/**
 * Wires the ping runner, distributor, exporter and UI together.
 *
 * Whichever ends first (the UI, a component failure, or the caller's signal)
 * cancels the rest. The first component failure is the result.
 */
export class App {
  private readonly engine: MetricsEngine;
  private readonly logger: Logger;
  private readonly shutdownTimeoutMs: number;

  constructor(
    private readonly config: MonitorConfig,
    private readonly deps: AppDeps,
  ) {
    this.engine = deps.engine ?? new MetricsEngine();
    this.logger = deps.logger ?? silentLogger;
    this.shutdownTimeoutMs = deps.shutdownTimeoutMs ?? SHUTDOWN_TIMEOUT_MS;
  }

  async run(signal?: AbortSignal): Promise<void> {
    const controller = new AbortController();
    const cancel = (): void => controller.abort();
    if (signal?.aborted) cancel();
    signal?.addEventListener('abort', cancel, { once: true });

    const samples = new Channel<Sample>(this.config.sampleBufferSize);
    const uiSamples = new Channel<Sample>(this.config.uiBufferSize);
    const uiStats = new Channel<Stats>(this.config.metricsBufferSize);
    const distributor = new Distributor(
      samples,
      this.engine,
      { samples: uiSamples, stats: uiStats },
      this.deps.exporter,
    );

    let failure: Error | undefined;
    const fail = (error: Error): void => {
      if (!failure) {
        failure = error;
        this.logger.error({ err: error }, 'Component failed, shutting down');
      }
      controller.abort();
    };

    // Mount the UI first: if it cannot start, no component is running yet.
    let ui: UiHandle;
    try {
      ui = this.deps.ui({ config: this.config, samples: uiSamples, stats: uiStats });
    } catch (error) {
      signal?.removeEventListener('abort', cancel);
      throw wrap('UI', error);
    }

    this.logger.info(
      { target: this.config.target, intervalMs: this.config.intervalMs },
      'Monitor started',
    );

    const tasks: Promise<void>[] = [];
    const { exporter, runner } = this.deps;
    if (exporter) {
      tasks.push(exporter.start(controller.signal).catch((error: unknown) => fail(wrap('exporter', error))));
    }
    tasks.push(
      runner
        .run(samples, controller.signal)
        .catch((error: unknown) => fail(wrap('ping runner', error)))
        .finally(() => samples.close()),
    );
    tasks.push(distributor.run(controller.signal));

    let uiExited = false;
    const uiFinished = ui.waitUntilExit().then(
      () => undefined,
      (error: unknown) => toError(error),
    );
    const uiResult = uiFinished.then((error) => {
      uiExited = true;
      controller.abort();
      return error;
    });

    await Promise.race([uiResult, whenAborted(controller.signal)]);

    let uiError: Error | undefined;
    let uiTimedOut = false;
    if (uiExited) {
      uiError = await uiResult;
    } else {
      ui.unmount();
      try {
        uiError = await withTimeout(
          uiResult,
          this.shutdownTimeoutMs,
          `UI failed to shut down within ${this.shutdownTimeoutMs / 1000} seconds`,
        );
      } catch (error) {
        uiTimedOut = true;
        uiError = toError(error);
        this.logger.error({ err: uiError }, 'UI shutdown timed out');
      }
    }

    let tasksError: Error | undefined;
    try {
      await withTimeout(
        Promise.all(tasks),
        this.shutdownTimeoutMs,
        `components failed to stop within ${this.shutdownTimeoutMs / 1000} seconds`,
      );
    } catch (error) {
      tasksError = toError(error);
      if (error instanceof TimeoutError) {
        this.logger.error({ err: tasksError }, 'Component shutdown timed out');
      }
    } finally {
      signal?.removeEventListener('abort', cancel);
    }

    this.logger.info({ target: this.config.target }, 'Monitor stopped');

    if (failure) {
      if (uiTimedOut && uiError) {
        throw new Error(`original error: ${failure.message}; ${uiError.message}`, { cause: failure });
      }
      if (uiError) {
        throw new Error(`original error: ${failure.message}; failed to shut down UI: ${uiError.message}`, {
          cause: failure,
        });
      }
      throw failure;
    }
    if (uiError) throw uiError;
    if (tasksError) throw tasksError;
  }
}
