import type { Sample } from '@pingscope/shared';

/** Outcome of parsing one line of ping output */
export type ParseResult = { matched: true; sample: Sample } | { matched: false };

/** Turns one line of native ping output into at most one sample */
export interface LineParser {
  readonly platform: ParserPlatform;
  parseLine(line: string): ParseResult;
}

export type ParserPlatform = 'linux' | 'darwin' | 'win32';

export interface ParserOptions {
  /** Clock used for sample timestamps */
  now?: () => Date;
}

export const NO_MATCH: ParseResult = { matched: false };
