/**
 * One probe outcome, created once by a line parser and never mutated.
 *
 * `sequence` means different things per platform (protocol `icmp_seq` on
 * Linux/Darwin replies, {@link UNKNOWN_SEQUENCE} on their timeouts, a parser
 * counter on Windows). Order samples by arrival, never by sequence.
 */
export interface Sample {
  readonly timestamp: Date;
  readonly sequence: number;
  /** Round-trip time in milliseconds, microsecond precision. 0 for timeouts. */
  readonly rttMs: number;
  readonly timeout: boolean;
}

/** RTT in milliseconds, or -1 when the sample is a timeout. */
export function sampleRttMs(sample: Sample): number {
  return sample.timeout ? -1 : sample.rttMs;
}
