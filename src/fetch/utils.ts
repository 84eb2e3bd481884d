import type { HeaderOptions } from '../types/request.js';

/**
 * Turns a header value into a string, or `null` for values a header cannot hold.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map(([key, value]): [string, unknown] => [key, value]);
  }

  return Object.entries(headers);
}

/**
 * Merges header sources left to right into one `Headers` instance.
 *
 * - Keys compare case-insensitively; a later source overwrites an earlier one.
 * - `null` deletes the header, `undefined` is skipped.
 * - Non-scalar values are dropped.
 */
export function mergeHeaderOptions(...sources: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const source of sources) {
    for (const [key, value] of toEntries(source)) {
      if (value === undefined) {
        continue;
      }

      if (value === null) {
        merged.delete(key);
        continue;
      }

      const clean = sanitize(value);
      if (clean !== null) {
        merged.set(key, clean);
      }
    }
  }

  return merged;
}
