import { UNKNOWN_SEQUENCE } from '@pingscope/shared';
import { parseMilliseconds } from './rtt.js';
import { type LineParser, NO_MATCH, type ParseResult, type ParserOptions } from './types.js';

// 64 bytes from 8.8.8.8: icmp_seq=1 ttl=118 time=14.3 ms
const REPLY_PATTERN = /icmp_seq=(\d+).*time=([0-9.]+)\s*ms/;
// Request timeout, "no answer yet" (-O), Destination Host Unreachable, Time to live exceeded
const TIMEOUT_PATTERN = /request timeout|no answer|time.*exceeded|unreachable/i;

/**
 * Parser for iputils / busybox ping on Linux.
 */
export class LinuxParser implements LineParser {
  readonly platform = 'linux';
  private readonly now: () => Date;

  constructor(options: ParserOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  parseLine(line: string): ParseResult {
    const reply = line.match(REPLY_PATTERN);
    if (reply) {
      const rttMs = parseMilliseconds(reply[2] ?? '');
      if (rttMs === undefined) return NO_MATCH;
      return {
        matched: true,
        sample: {
          timestamp: this.now(),
          sequence: Number.parseInt(reply[1] ?? '', 10),
          rttMs,
          timeout: false,
        },
      };
    }

    if (TIMEOUT_PATTERN.test(line)) {
      return {
        matched: true,
        sample: { timestamp: this.now(), sequence: UNKNOWN_SEQUENCE, rttMs: 0, timeout: true },
      };
    }

    return NO_MATCH;
  }
}
