import { z } from 'zod';
import {
  DEFAULT_HISTORY_SIZE,
  DEFAULT_INTERVAL_MS,
  DEFAULT_METRICS_BUFFER_SIZE,
  DEFAULT_SAMPLE_BUFFER_SIZE,
  DEFAULT_UI_BUFFER_SIZE,
  LogLevel,
  MAX_HISTORY_SIZE,
  MAX_INTERVAL_MS,
  MIN_INTERVAL_MS,
} from '../types/common.js';

/**
 * Validated monitor configuration.
 */
export const MonitorConfig = z.object({
  /** Host name or IP literal to ping */
  target: z.string().min(1, 'target host required'),
  /** Delay between probes in ms */
  intervalMs: z
    .number()
    .int()
    .min(MIN_INTERVAL_MS, 'interval must be at least 100ms')
    .max(MAX_INTERVAL_MS, 'interval must be at most 1 hour')
    .default(DEFAULT_INTERVAL_MS),
  /** Samples kept for heatmap scroll-back */
  historySize: z
    .number()
    .int()
    .positive('history size must be positive')
    .max(MAX_HISTORY_SIZE, 'history size must be at most 10000000')
    .default(DEFAULT_HISTORY_SIZE),
  sampleBufferSize: z.number().int().positive().default(DEFAULT_SAMPLE_BUFFER_SIZE),
  uiBufferSize: z.number().int().positive().default(DEFAULT_UI_BUFFER_SIZE),
  metricsBufferSize: z.number().int().positive().default(DEFAULT_METRICS_BUFFER_SIZE),
  /** Prometheus listen address, e.g. ":9090". Exporter is off when unset. */
  exporterAddr: z.string().optional(),
  showHelp: z.boolean().default(false),
  headless: z.boolean().default(false),
  logLevel: LogLevel.default('warn'),
  logFile: z.string().optional(),
});
export type MonitorConfig = z.infer<typeof MonitorConfig>;
export type MonitorConfigInput = z.input<typeof MonitorConfig>;
