import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Header options accepted anywhere headers are merged. In the record form a
 * `null` value removes the header and `undefined` leaves it untouched.
 */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** HTTP verbs the API is called with. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Options to pass in for each fetch request */
export interface FetchOptions extends Omit<RequestInit, 'headers' | 'method'> {
  /** Request headers; `null` entries are dropped. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Contract for transports used by `RequestClient`; any status is a successful transport. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (url: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, Response>;
  /** Executes a PUT request. */
  put: (url: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
  /** Executes a PATCH request. */
  patch: (url: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
  /** Executes a POST request. */
  post: (url: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
  /** Executes a DELETE request. */
  delete: (url: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, Response>;
  /** Optional lifecycle hook to dispose resources (e.g., keep-alive agents). */
  dispose?: () => void;
}

/** Factory signature for constructing transports. */
export interface FetchClientProvider {
  /** Creates a new transport bound to a base URL */
  new (baseUrl: string): FetchClientProviderDefinition;
}
