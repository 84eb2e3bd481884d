import { AbortError, isAbortError } from '../error/abortError.js';
import { RequestError } from '../error/requestError.js';
import type { ShipthisError } from '../error/shipthisError.js';
import { isTimeoutError } from '../error/timeoutError.js';
import { FetchClient } from '../fetch/client.js';
import type { FetchClientProviderDefinition, FetchOptions, HttpMethod } from '../types/request.js';
import { errorCode, rootMessage } from '../utils/guards.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { withQuery } from '../utils/query.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { classifyResponse, classifyUploadResponse } from './envelope.js';
import type { DispatchRequest, RequestClientProps, UploadRequest } from './types.js';

/** Node socket and DNS error codes reported as connection errors. */
const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH']);

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 30_000;

/**
 * Maps a transport rejection onto a {@link RequestError}. Timeouts keep the
 * conventional 408 status; everything else has no status since no response arrived.
 * `callerAborted` marks a failure that followed an abort of the caller's signal,
 * whatever reason it was aborted with.
 */
export function classifyTransportError(err: Error, prefix = 'Request', callerAborted = false): RequestError {
  if (isTimeoutError(err)) {
    return new RequestError(`${prefix} timed out`, { statusCode: 408, cause: err });
  }

  if (callerAborted || isAbortError(err)) {
    return new RequestError(`${prefix} aborted: ${rootMessage(err)}`, { cause: err });
  }

  const code = errorCode(err);
  if (code && CONNECTION_ERROR_CODES.has(code)) {
    return new RequestError(`Connection error: ${rootMessage(err)}`, { cause: err });
  }

  return new RequestError(`${prefix} failed: ${rootMessage(err)}`, { cause: err });
}

/**
 * Request dispatcher shared by every API operation:
 * - sends exactly one request per call through a pluggable transport, never retrying,
 * - enforces a per-call timeout and aborts everything in flight on {@link dispose},
 * - classifies the outcome into data, `AuthError` or `RequestError`.
 *
 * All methods resolve error-first tuples via {@link SafeWrapAsync}; none reject.
 */
export class RequestClient {
  /** Underlying transport. */
  #fetchClient: FetchClientProviderDefinition;
  /** Default request timeout in milliseconds. */
  #timeout: number;
  /** Base URL the transport resolves paths against. */
  #baseUrl: string;
  /** Structured logger. */
  #logger: Logger;
  /** Global abort-controller for disposing */
  #abortController: AbortController;

  constructor({ baseUrl, fetchProvider = FetchClient, timeout = DEFAULT_TIMEOUT, logger }: RequestClientProps) {
    this.#baseUrl = baseUrl;
    this.#timeout = timeout;
    this.#logger = logger ?? createLogger();
    this.#abortController = new AbortController();
    this.#fetchClient = new fetchProvider(baseUrl);
  }

  /** Base URL the client was created with. */
  get baseUrl(): string {
    return this.#baseUrl;
  }

  /** Default timeout in milliseconds. */
  get timeout(): number {
    return this.#timeout;
  }

  /**
   * Updates the default timeout at runtime.
   */
  config({ timeout }: Pick<RequestClientProps, 'timeout'>) {
    if (timeout !== undefined) {
      this.#timeout = timeout;
    }
  }

  /**
   * Aborts every in-flight request and makes later ones fail immediately.
   */
  dispose() {
    this.#abortController.abort(new AbortError('client was disposed'));
    this.#fetchClient.dispose?.();
  }

  /**
   * Sends one JSON request and classifies the response.
   *
   * @returns `[null, data]` with the envelope's `data` (possibly `null`), or
   * `[error, null]` with an `AuthError` or `RequestError`.
   */
  async request({ method, path, query, body, headers, timeout, signal }: DispatchRequest): SafeWrapAsync<
    ShipthisError,
    unknown
  > {
    const url = withQuery(path, query);
    const options: FetchOptions = { headers };
    if (body !== undefined) {
      const [errBody, serialised] = safeWrap(() => JSON.stringify(body));
      if (errBody) {
        return [new RequestError('Request body is not JSON-serialisable', { cause: errBody }), null];
      }

      options.body = serialised;
    }

    return this.#dispatch(method, url, options, timeout ?? this.#timeout, signal, 'Request', classifyResponse);
  }

  /**
   * Posts a multipart form and classifies the bare (non-envelope) response.
   * Uploads run with twice the effective timeout.
   */
  async upload({ url, form, headers, timeout, signal }: UploadRequest): SafeWrapAsync<ShipthisError, unknown> {
    const effective = (timeout ?? this.#timeout) * 2;

    return this.#dispatch('POST', url, { headers, body: form }, effective, signal, 'Upload', classifyUploadResponse);
  }

  /**
   * Core pipeline: merge signals, send through the transport, read the body as
   * text, hand it to the classifier, and log the outcome.
   */
  async #dispatch(
    method: HttpMethod,
    url: string,
    options: FetchOptions,
    timeout: number,
    signal: AbortSignal | undefined,
    label: 'Request' | 'Upload',
    classify: (status: number, text: string) => SafeWrap<ShipthisError, unknown>,
  ): SafeWrapAsync<ShipthisError, unknown> {
    const startedAt = Date.now();
    const log = this.#logger.child({ method, path: url });

    if (this.#abortController.signal.aborted) {
      const err = classifyTransportError(new AbortError('client was disposed'), label);
      log.warn({ errorKind: err.name, statusCode: err.statusCode }, err.message);
      return [err, null];
    }

    // Aborted once the exchange is over, releasing the timer and the listeners
    // the merged signal holds on the long-lived sources.
    const settled = new AbortController();
    const mergedSignal = mergeSignals([
      signal,
      createTimeoutSignal(timeout, settled.signal),
      this.#abortController.signal,
      settled.signal,
    ]);

    try {
      const requestOptions: FetchOptions = mergedSignal ? { ...options, signal: mergedSignal } : options;
      const [err, data] = await this.#exchange(method, url, requestOptions, signal, label, classify);
      const elapsedMs = Date.now() - startedAt;
      if (err) {
        log.warn({ errorKind: err.name, statusCode: err.statusCode, elapsedMs }, err.message);
        return [err, null];
      }

      log.debug({ elapsedMs }, `${label.toLowerCase()} completed`);
      return [null, data];
    } finally {
      settled.abort();
    }
  }

  /**
   * Sends the request, reads the body and classifies the outcome.
   */
  async #exchange(
    method: HttpMethod,
    url: string,
    options: FetchOptions,
    callerSignal: AbortSignal | undefined,
    label: 'Request' | 'Upload',
    classify: (status: number, text: string) => SafeWrap<ShipthisError, unknown>,
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errSend, response] = await this.#send(method, url, options);
    if (errSend) {
      return [classifyTransportError(errSend, label, callerSignal?.aborted), null];
    }

    const [errText, text] = await safeWrapAsync(() => response.text());
    if (errText) {
      return [classifyTransportError(errText, label, callerSignal?.aborted), null];
    }

    this.#logger.trace({ method, path: url, statusCode: response.status }, 'response received');
    return classify(response.status, text);
  }

  /**
   * Calls the transport for the given verb, catching providers that throw
   * instead of resolving a tuple.
   */
  async #send(method: HttpMethod, url: string, options: FetchOptions): SafeWrapAsync<Error, Response> {
    const [errWrapped, wrapped] = await safeWrapAsync(() => {
      switch (method) {
        case 'GET':
          return this.#fetchClient.get(url, options);
        case 'POST':
          return this.#fetchClient.post(url, options);
        case 'PUT':
          return this.#fetchClient.put(url, options);
        case 'PATCH':
          return this.#fetchClient.patch(url, options);
        case 'DELETE':
          return this.#fetchClient.delete(url, options);
      }
    });

    if (errWrapped) {
      return [new Error(`error calling ${method} in request`, { cause: errWrapped }), null];
    }

    return wrapped;
  }
}
