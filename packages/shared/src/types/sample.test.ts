import { describe, expect, it } from 'vitest';
import { UNKNOWN_SEQUENCE } from './common.js';
import { type Sample, sampleRttMs } from './sample.js';

describe('sampleRttMs', () => {
  it('returns the RTT of a reply', () => {
    const sample: Sample = { timestamp: new Date(0), sequence: 3, rttMs: 14.236, timeout: false };
    expect(sampleRttMs(sample)).toBe(14.236);
  });

  it('returns -1 for a timeout', () => {
    const sample: Sample = {
      timestamp: new Date(0),
      sequence: UNKNOWN_SEQUENCE,
      rttMs: 0,
      timeout: true,
    };
    expect(sampleRttMs(sample)).toBe(-1);
  });
});
