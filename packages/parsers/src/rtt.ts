/**
 * Parse a millisecond field such as "14.236" without losing the fractional
 * part. Returns undefined for anything that is not a finite, non-negative number.
 */
export function parseMilliseconds(text: string): number | undefined {
  if (text === '') return undefined;
  const value = Number(text);
  if (!Number.isFinite(value) || value < 0) return undefined;
  return value;
}
