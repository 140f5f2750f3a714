import { type Logger, pino } from 'pino';
import type { LogLevel } from './types/common.js';

export type { Logger };

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Append to this file instead of stderr */
  file?: string;
}

/**
 * JSON logger. Defaults to stderr so a terminal UI can keep stdout.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const destination = pino.destination({
    dest: options.file ?? 2,
    sync: options.file === undefined,
  });
  return pino(
    {
      name: options.name ?? 'pingscope',
      level: options.level ?? 'warn',
    },
    destination,
  );
}

/** Logger that discards everything; the default for library code and tests. */
export const silentLogger: Logger = pino({ level: 'silent' });
