export { PrometheusExporter, type ExporterOptions } from './exporter.js';
export { PingMetrics } from './metrics.js';
export { createExporterApp, serve } from './server.js';
