import { z } from 'zod';

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

/** Successful RTT above this is counted as a brownout sample */
export const BROWNOUT_THRESHOLD_MS = 200;

/** Sequence number for samples whose protocol sequence is unknown */
export const UNKNOWN_SEQUENCE = -1;

export const DEFAULT_INTERVAL_MS = 1_000;
export const MIN_INTERVAL_MS = 100;
export const MAX_INTERVAL_MS = 60 * 60 * 1_000;

/** Display history length in samples */
export const DEFAULT_HISTORY_SIZE = 30_000;
export const MAX_HISTORY_SIZE = 10_000_000;

/** Runner -> distributor channel capacity */
export const DEFAULT_SAMPLE_BUFFER_SIZE = 100;

/** Distributor -> UI sample channel capacity */
export const DEFAULT_UI_BUFFER_SIZE = 100;

/** Distributor -> UI stats channel capacity */
export const DEFAULT_METRICS_BUFFER_SIZE = 10;

/** Upper bound on any wait during shutdown */
export const SHUTDOWN_TIMEOUT_MS = 5_000;
