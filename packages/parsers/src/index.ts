import { DarwinParser } from './darwin.js';
import { LinuxParser } from './linux.js';
import type { LineParser, ParserOptions } from './types.js';
import { WindowsParser } from './windows.js';

export type { LineParser, ParseResult, ParserOptions, ParserPlatform } from './types.js';
export { NO_MATCH } from './types.js';
export { LinuxParser } from './linux.js';
export { DarwinParser } from './darwin.js';
export { WindowsParser } from './windows.js';
export { parseMilliseconds } from './rtt.js';

/**
 * Select the parser for a platform identifier as reported by `process.platform`.
 * Anything other than darwin or win32 gets the Linux parser.
 */
export function createParser(platform: string, options: ParserOptions = {}): LineParser {
  switch (platform) {
    case 'darwin':
      return new DarwinParser(options);
    case 'win32':
      return new WindowsParser(options);
    default:
      return new LinuxParser(options);
  }
}
