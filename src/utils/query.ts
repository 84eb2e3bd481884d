/** Scalar accepted as a query parameter; `undefined` and `null` entries are skipped. */
export type QueryValue = string | number | boolean | null | undefined;

/** Query parameters for one request. */
export type QueryParams = Record<string, QueryValue>;

/**
 * Joins path segments with `/`, URI-encoding each one so that ids and
 * collection names can never add path levels of their own.
 *
 * @example
 * buildPath('incollection', 'sea_shipment', 'a/b') // 'incollection/sea_shipment/a%2Fb'
 */
export function buildPath(...segments: Array<string | number>): string {
  return segments.map((segment) => encodeURIComponent(String(segment))).join('/');
}

/**
 * Serialises query parameters, preserving insertion order.
 * Returns an empty string when nothing is left after skipping empty entries.
 */
export function buildQuery(params?: QueryParams): string {
  if (!params) {
    return '';
  }

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) {
      continue;
    }

    search.append(key, String(value));
  }

  return search.toString();
}

/**
 * Appends the serialised query to a path, with `?` only when there is one.
 */
export function withQuery(path: string, params?: QueryParams): string {
  const query = buildQuery(params);
  if (!query) {
    return path;
  }

  return `${path}${path.includes('?') ? '&' : '?'}${query}`;
}
