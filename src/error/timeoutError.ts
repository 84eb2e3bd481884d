import { isErrorType } from './isErrorType.js';

/**
 * Abort reason used when a request exceeds its timeout. It never reaches
 * callers directly; it is kept as the `cause` of the resulting request error.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';

  /** Timeout that elapsed, in milliseconds */
  readonly timeout: number;

  constructor(timeout: number, opts?: ErrorOptions) {
    super(`error request timed out after ${timeout}ms`, opts);
    this.name = 'TimeoutError';
    this.timeout = timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}, following nested causes.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
