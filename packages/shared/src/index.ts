// Types
export {
  LogLevel,
  BROWNOUT_THRESHOLD_MS,
  UNKNOWN_SEQUENCE,
  DEFAULT_INTERVAL_MS,
  MIN_INTERVAL_MS,
  MAX_INTERVAL_MS,
  DEFAULT_HISTORY_SIZE,
  MAX_HISTORY_SIZE,
  DEFAULT_SAMPLE_BUFFER_SIZE,
  DEFAULT_UI_BUFFER_SIZE,
  DEFAULT_METRICS_BUFFER_SIZE,
  SHUTDOWN_TIMEOUT_MS,
} from './types/common.js';
export { type Sample, sampleRttMs } from './types/sample.js';
export {
  type Percentiles,
  type Stats,
  type StatsSink,
  emptyPercentiles,
  emptyStats,
} from './types/stats.js';

// Schemas
export { MonitorConfig, type MonitorConfigInput } from './schemas/config.js';

// Logging
export { type Logger, type LoggerOptions, createLogger, silentLogger } from './logger.js';

// Networking
export { type ListenAddress, parseListenAddress } from './net/address.js';
