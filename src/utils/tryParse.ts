import { type SafeWrap, safeWrap } from './wrap.js';

/** Longest slice of a raw body kept in error messages. */
export const BODY_EXCERPT_LENGTH = 200;

/**
 * Attempts to parse a string as JSON.
 *
 * If parsing succeeds, returns the parsed value; otherwise returns the original input unchanged.
 * This function never throws.
 */
export function tryParse(input: string): unknown {
  const [errParsed, parsed] = parseJson(input);
  if (errParsed) {
    return input;
  }

  return parsed;
}

/**
 * Parses a string as JSON into a tuple; the error side is a `SyntaxError`.
 */
export function parseJson(input: string): SafeWrap<Error, unknown> {
  return safeWrap<unknown>(() => JSON.parse(input));
}

/**
 * First {@link BODY_EXCERPT_LENGTH} characters of a raw body, for error messages.
 */
export function excerpt(input: string): string {
  return input.slice(0, BODY_EXCERPT_LENGTH);
}
