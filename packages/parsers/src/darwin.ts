import { UNKNOWN_SEQUENCE } from '@pingscope/shared';
import { parseMilliseconds } from './rtt.js';
import { type LineParser, NO_MATCH, type ParseResult, type ParserOptions } from './types.js';

// macOS numbers icmp_seq from 0:
// 64 bytes from 8.8.8.8: icmp_seq=0 ttl=118 time=14.236 ms
const REPLY_PATTERN = /icmp_seq=(\d+).*time=([0-9.]+)\s*ms/;
// Request timeout for icmp_seq 0
const TIMEOUT_PATTERN = /request timeout|no answer|time.*exceeded|unreachable/i;

export class DarwinParser implements LineParser {
  readonly platform = 'darwin';
  private readonly now: () => Date;

  constructor(options: ParserOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  parseLine(line: string): ParseResult {
    const reply = REPLY_PATTERN.exec(line);
    if (reply !== null) {
      const rttMs = parseMilliseconds(reply[2] ?? '');
      if (rttMs === undefined) return NO_MATCH;
      const sequence = Number.parseInt(reply[1] ?? '', 10);
      return {
        matched: true,
        sample: { timestamp: this.now(), sequence, rttMs, timeout: false },
      };
    }

    if (!TIMEOUT_PATTERN.test(line)) return NO_MATCH;

    return {
      matched: true,
      sample: { timestamp: this.now(), sequence: UNKNOWN_SEQUENCE, rttMs: 0, timeout: true },
    };
  }
}
