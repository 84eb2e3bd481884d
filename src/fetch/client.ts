import type { FetchClientProviderDefinition, FetchOptions, HttpMethod } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/**
 * Thin wrapper around the native `fetch` API that:
 * - prefixes relative paths with a configured base URL, leaving absolute URLs alone,
 * - normalizes per-request headers, dropping `null` entries,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Any HTTP status counts as a completed transport; only network failures and
 * aborts come back on the error side. Interpreting the status is up to the caller.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base URL prepended to relative request paths. */
  #baseUrl: string;

  /** Creates a new instance of the fetch-client bound to a base URL. */
  constructor(baseUrl: string) {
    this.#baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  }

  /** Executes a GET request against the given path. */
  public get(path: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request('GET', path, { ...opts, body: undefined });
  }

  /** Executes a PUT request against the given path. */
  public put(path: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('PUT', path, opts);
  }

  /** Executes a PATCH request against the given path. */
  public patch(path: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('PATCH', path, opts);
  }

  /** Executes a POST request against the given path. */
  public post(path: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('POST', path, opts);
  }

  /** Executes a DELETE request against the given path. */
  public delete(path: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request('DELETE', path, { ...opts, body: undefined });
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   * Rejections from `fetch` (network errors, aborts) are wrapped with the
   * original error, or the abort reason, as `cause`.
   */
  async #request(method: HttpMethod, path: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const { headers, signal, ...init } = opts;

    const [err, res] = await safeWrapAsync(() =>
      fetch(this.constructPath(path), {
        ...init,
        method,
        headers: mergeHeaderOptions(headers),
        ...(signal && { signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${method} request in fetchClient`, { cause: err }), null];
    }

    return [null, res];
  }

  /**
   * Resolves a path against the base URL. Absolute `http(s)` URLs pass through,
   * and a leading slash is stripped to avoid `//`.
   */
  private constructPath(path: string): string {
    if (/^https?:\/\//i.test(path)) {
      return path;
    }

    return `${this.#baseUrl}${path.replace(/^\//, '')}`;
  }
}
