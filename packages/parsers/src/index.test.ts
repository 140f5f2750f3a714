import { describe, expect, it } from 'vitest';
import { DarwinParser, LinuxParser, WindowsParser, createParser, parseMilliseconds } from './index.js';

describe('createParser', () => {
  it('selects the parser by platform identifier', () => {
    expect(createParser('darwin')).toBeInstanceOf(DarwinParser);
    expect(createParser('win32')).toBeInstanceOf(WindowsParser);
    expect(createParser('linux')).toBeInstanceOf(LinuxParser);
  });

  it('falls back to the Linux parser for other platforms', () => {
    expect(createParser('freebsd').platform).toBe('linux');
    expect(createParser('').platform).toBe('linux');
  });

  it('returns independent Windows counters per parser', () => {
    const a = createParser('win32');
    const b = createParser('win32');
    a.parseLine('Request timed out.');
    a.parseLine('Request timed out.');
    const result = b.parseLine('Request timed out.');

    expect(result.matched && result.sample.sequence).toBe(1);
  });

  it('passes the clock through', () => {
    const fixed = new Date('2026-02-03T04:05:06Z');
    const result = createParser('linux', { now: () => fixed }).parseLine(
      '64 bytes from 10.0.0.1: icmp_seq=1 ttl=64 time=1 ms',
    );
    expect(result.matched && result.sample.timestamp).toBe(fixed);
  });
});

describe('parseMilliseconds', () => {
  it('parses decimal values', () => {
    expect(parseMilliseconds('14.236')).toBe(14.236);
    expect(parseMilliseconds('0')).toBe(0);
  });

  it('rejects empty or malformed input', () => {
    expect(parseMilliseconds('')).toBeUndefined();
    expect(parseMilliseconds('1.2.3')).toBeUndefined();
    expect(parseMilliseconds('.')).toBeUndefined();
  });
});
