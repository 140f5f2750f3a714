import { describe, expect, it } from 'vitest';
import { WindowsParser } from './windows.js';

const FIXED = new Date('2026-01-01T00:00:00Z');

describe('WindowsParser', () => {
  it('parses a standard reply', () => {
    const parser = new WindowsParser({ now: () => FIXED });

    expect(parser.parseLine('Reply from 10.0.0.8: bytes=32 time=14ms TTL=118')).toEqual({
      matched: true,
      sample: { timestamp: FIXED, sequence: 1, rttMs: 14, timeout: false },
    });
  });

  it('reads time<1ms as exactly 1ms', () => {
    const parser = new WindowsParser();
    const result = parser.parseLine('Reply from 192.168.1.1: bytes=32 time<1ms TTL=64');

    expect(result.matched).toBe(true);
    if (result.matched) {
      expect(result.sample.timeout).toBe(false);
      expect(result.sample.rttMs).toBe(1);
    }
  });

  it('emits timeouts for the failure vocabulary', () => {
    const parser = new WindowsParser();

    for (const line of [
      'Request timed out.',
      'Destination host unreachable.',
      'Reply from 10.0.0.254: Destination net unreachable.',
      'PING: transmit failed. General failure.',
      'General failure.',
    ]) {
      const result = parser.parseLine(line);
      expect(result.matched).toBe(true);
      if (result.matched) expect(result.sample.timeout).toBe(true);
    }
  });

  it('numbers every matched line, replies and timeouts alike', () => {
    const parser = new WindowsParser();
    const lines = [
      'Pinging 10.0.0.8 with 32 bytes of data:',
      'Reply from 10.0.0.8: bytes=32 time=3ms TTL=118',
      'Request timed out.',
      '',
      'Reply from 10.0.0.8: bytes=32 time=4ms TTL=118',
    ];

    const sequences = lines
      .map((line) => parser.parseLine(line))
      .flatMap((r) => (r.matched ? [r.sample.sequence] : []));

    expect(sequences).toEqual([1, 2, 3]);
  });

  it('ignores statistics lines', () => {
    const parser = new WindowsParser();
    expect(parser.parseLine('Ping statistics for 10.0.0.8:').matched).toBe(false);
    expect(
      parser.parseLine('    Packets: Sent = 4, Received = 4, Lost = 0 (0% loss),').matched,
    ).toBe(false);
    expect(
      parser.parseLine('    Minimum = 3ms, Maximum = 4ms, Average = 3ms').matched,
    ).toBe(false);
  });
});
