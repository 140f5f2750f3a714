import { describe, expect, it } from 'vitest';
import { LinuxParser } from './linux.js';

const FIXED = new Date('2026-01-01T00:00:00Z');

const LINUX_OUTPUT = `PING 10.0.0.1 (10.0.0.1) 56(84) bytes of data.
64 bytes from 10.0.0.1: icmp_seq=1 ttl=64 time=0.543 ms
64 bytes from 10.0.0.1: icmp_seq=2 ttl=64 time=0.401 ms
From 10.0.0.254 icmp_seq=3 Destination Host Unreachable
64 bytes from 10.0.0.1: icmp_seq=4 ttl=64 time=0.392 ms

--- 10.0.0.1 ping statistics ---
4 packets transmitted, 3 received, +1 errors, 25% packet loss, time 3005ms
rtt min/avg/max/mdev = 0.392/0.445/0.543/0.065 ms
`;

function parser(): LinuxParser {
  return new LinuxParser({ now: () => FIXED });
}

describe('LinuxParser', () => {
  it('parses a standard reply', () => {
    const result = parser().parseLine('64 bytes from 8.8.8.8: icmp_seq=1 ttl=118 time=14.3 ms');

    expect(result).toEqual({
      matched: true,
      sample: { timestamp: FIXED, sequence: 1, rttMs: 14.3, timeout: false },
    });
  });

  it('parses a reply that names the host', () => {
    const result = parser().parseLine(
      '64 bytes from dns.example (10.1.1.1): icmp_seq=5 ttl=118 time=10.1 ms',
    );

    expect(result.matched).toBe(true);
    if (result.matched) {
      expect(result.sample.sequence).toBe(5);
      expect(result.sample.rttMs).toBeCloseTo(10.1, 6);
    }
  });

  it('keeps sub-millisecond precision', () => {
    const result = parser().parseLine('64 bytes from 10.0.0.1: icmp_seq=5 ttl=118 time=14.236 ms');

    expect(result.matched).toBe(true);
    if (result.matched) {
      expect(result.sample.sequence).toBe(5);
      expect(Math.abs(result.sample.rttMs - 14.236)).toBeLessThan(0.001);
    }
  });

  it('parses a reply without space before the unit', () => {
    const result = parser().parseLine('64 bytes from 10.0.0.1: icmp_seq=9 ttl=64 time=2.5ms');

    expect(result.matched).toBe(true);
    if (result.matched) expect(result.sample.rttMs).toBe(2.5);
  });

  it('emits a timeout with the unknown sequence', () => {
    const result = parser().parseLine('no answer yet for icmp_seq=7');

    expect(result).toEqual({
      matched: true,
      sample: { timestamp: FIXED, sequence: -1, rttMs: 0, timeout: true },
    });
  });

  it('matches the timeout vocabulary case-insensitively', () => {
    const p = parser();
    expect(p.parseLine('Request timeout for icmp_seq 0').matched).toBe(true);
    expect(p.parseLine('From 10.0.0.254 icmp_seq=3 Destination Host Unreachable').matched).toBe(
      true,
    );
    expect(p.parseLine('From 10.0.0.254 icmp_seq=4 Time to live exceeded').matched).toBe(true);
  });

  it('treats a malformed RTT as unmatched', () => {
    const result = parser().parseLine('64 bytes from 10.0.0.1: icmp_seq=1 ttl=64 time=1.2.3 ms');
    expect(result).toEqual({ matched: false });
  });

  it('ignores header, summary and blank lines', () => {
    const p = parser();
    expect(p.parseLine('PING 10.0.0.1 (10.0.0.1) 56(84) bytes of data.').matched).toBe(false);
    expect(p.parseLine('5 packets transmitted, 5 received, 0% packet loss').matched).toBe(false);
    expect(p.parseLine('').matched).toBe(false);
  });

  it('extracts one sample per probe line of a full run', () => {
    const p = parser();
    const samples = LINUX_OUTPUT.split('\n')
      .map((line) => p.parseLine(line))
      .flatMap((r) => (r.matched ? [r.sample] : []));

    expect(samples.map((s) => s.timeout)).toEqual([false, false, true, false]);
    expect(samples.map((s) => s.sequence)).toEqual([1, 2, -1, 4]);
    expect(samples[0]?.rttMs).toBe(0.543);
  });
});
