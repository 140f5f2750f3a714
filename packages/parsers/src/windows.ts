import { type LineParser, NO_MATCH, type ParseResult, type ParserOptions } from './types.js';

// Reply from 8.8.8.8: bytes=32 time=14ms TTL=118
// Fast replies print "time<1ms", which is read as 1ms.
const REPLY_PATTERN = /Reply from.*time[<=]?(\d+)\s*ms/;
const TIMEOUT_PATTERN =
  /request timed out|destination.*unreachable|transmit failed|general failure/i;

/**
 * Parser for Windows ping.exe, run under code page 437 so the text is English.
 *
 * Windows prints no sequence number, so the parser numbers matched lines
 * itself, starting at 1.
 */
export class WindowsParser implements LineParser {
  readonly platform = 'win32';
  private readonly now: () => Date;
  private seqCounter = 0;

  constructor(options: ParserOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  parseLine(line: string): ParseResult {
    const reply = line.match(REPLY_PATTERN);
    if (reply) {
      this.seqCounter++;
      return {
        matched: true,
        sample: {
          timestamp: this.now(),
          sequence: this.seqCounter,
          rttMs: Number.parseInt(reply[1] ?? '0', 10),
          timeout: false,
        },
      };
    }

    if (TIMEOUT_PATTERN.test(line)) {
      this.seqCounter++;
      return {
        matched: true,
        sample: { timestamp: this.now(), sequence: this.seqCounter, rttMs: 0, timeout: true },
      };
    }

    return NO_MATCH;
  }
}
