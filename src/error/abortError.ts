import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request is intentionally aborted, either by a caller
 * signal or by disposing the client.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static name = 'AbortError';

  constructor(message: string, opts?: ErrorOptions) {
    super(message, opts);
    this.name = 'AbortError';
  }
}

/**
 * Type guard for {@link AbortError}, following nested causes. Also matches the
 * DOMException fetch rejects with when a signal aborts without a reason, which
 * transports usually wrap.
 */
export function isAbortError(error: unknown): boolean {
  if (isErrorType(AbortError, error)) {
    return true;
  }

  const seen = new Set<unknown>();
  let current: unknown = error;
  while (typeof current === 'object' && current !== null && !seen.has(current)) {
    if (current instanceof DOMException && current.name === 'AbortError') {
      return true;
    }

    seen.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }

  return false;
}
