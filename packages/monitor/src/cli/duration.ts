const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  μs: 1e-3,
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const COMPONENT_RE = /^(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/;

/**
 * Parse a duration such as "500ms", "1.5s" or "1h2m3s" into milliseconds.
 * Returns undefined for anything else. A bare "0" is accepted.
 */
export function parseDuration(text: string): number | undefined {
  let rest = text;
  let sign = 1;
  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest.startsWith('-') ? -1 : 1;
    rest = rest.slice(1);
  }
  if (rest === '0') return 0;
  if (rest === '') return undefined;

  let total = 0;
  while (rest !== '') {
    const match = rest.match(COMPONENT_RE);
    const value = match?.[1];
    const unit = match?.[2];
    if (!match || value === undefined || unit === undefined) return undefined;

    total += Number(value) * (UNIT_MS[unit] ?? 0);
    rest = rest.slice(match[0].length);
  }
  return sign * total;
}
