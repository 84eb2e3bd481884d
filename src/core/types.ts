import type { FetchClientProvider, HeaderOptions, HttpMethod } from '../types/request.js';
import type { Logger } from '../utils/logger.js';
import type { QueryParams } from '../utils/query.js';

/** Per-call knobs shared by every operation. */
export interface CallOptions {
  /**
   * Headers applied over everything else for this call; `null` removes one.
   * @default undefined
   */
  headers?: HeaderOptions;
  /**
   * Timeout for this call in milliseconds.
   * @default the client timeout
   */
  timeout?: number;
  /**
   * Signal to cancel this call.
   * @default undefined
   */
  signal?: AbortSignal;
}

/** One JSON request against the API. */
export interface DispatchRequest extends Omit<CallOptions, 'headers'> {
  method: HttpMethod;
  /** Path relative to the base URL, or an absolute URL. */
  path: string;
  query?: QueryParams;
  /** JSON-serialisable body; omitted from the request when `undefined`. */
  body?: unknown;
  /** Final headers for the request, see `buildHeaders`. */
  headers: Headers;
}

/** One multipart upload. */
export interface UploadRequest extends Omit<CallOptions, 'headers'> {
  /** Absolute upload URL. */
  url: string;
  form: FormData;
  /** Final headers; must not carry a `Content-Type`, the transport writes the boundary. */
  headers: Headers;
}

/** Configuration for constructing a {@link RequestClient}. */
export interface RequestClientProps {
  /** Base URL every relative path is resolved against. */
  baseUrl: string;
  /**
   * Transport implementation.
   * @default FetchClient
   */
  fetchProvider?: FetchClientProvider;
  /**
   * Default timeout per request in milliseconds.
   * @default 30000
   */
  timeout?: number;
  /**
   * Logger receiving one debug line per request and one warning per failure.
   * @default a silent pino logger
   */
  logger?: Logger;
}
