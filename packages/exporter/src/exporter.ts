import { type Logger, type Stats, type StatsSink, silentLogger } from '@pingscope/shared';
import type { Hono } from 'hono';
import { PingMetrics } from './metrics.js';
import { createExporterApp, serve } from './server.js';

export interface ExporterOptions {
  /** Ping target, used as the `target` label */
  target: string;
  /** Listen address such as ":9090" */
  addr: string;
  logger?: Logger;
}

/** Publishes engine snapshots as Prometheus metrics over HTTP. */
export class PrometheusExporter implements StatsSink {
  readonly metrics: PingMetrics;
  readonly app: Hono;
  private readonly logger: Logger;

  constructor(private readonly options: ExporterOptions) {
    this.metrics = new PingMetrics(options.target);
    this.app = createExporterApp(this.metrics);
    this.logger = options.logger ?? silentLogger;
  }

  update(stats: Stats): void {
    this.metrics.update(stats);
  }

  start(signal: AbortSignal): Promise<void> {
    return serve(this.app, this.options.addr, signal, this.logger);
  }
}
