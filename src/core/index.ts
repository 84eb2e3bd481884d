/**
 * Core entrypoint: exports the request dispatcher and the header builder.
 * Import from here to build your own operations on top of the transport.
 * @module
 */

/**
 * Request dispatcher that:
 * - sends one request per call through a pluggable provider,
 * - enforces timeouts and client-wide cancellation,
 * - classifies responses into data, `AuthError` or `RequestError`.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}.
 */
export { classifyTransportError, DEFAULT_TIMEOUT, RequestClient } from './client.js';

/** Builds the headers for one request from the client configuration. */
export { buildHeaders, type HeaderConfig } from './headers.js';

/** Envelope parsing and response classification. */
export { classifyResponse, classifyUploadResponse, type ResponseEnvelope } from './envelope.js';

export type { CallOptions, DispatchRequest, RequestClientProps, UploadRequest } from './types.js';
