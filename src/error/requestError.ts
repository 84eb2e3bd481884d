import { isErrorType } from './isErrorType.js';
import { ShipthisError } from './shipthisError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised for every failed request that is not an authentication problem:
 * transport failures, timeouts, malformed bodies, unexpected statuses and
 * envelopes reporting `success: false`.
 */
export class RequestError extends ShipthisError {
  /** RequestError error-name */
  static name = 'RequestError';
}

/**
 * Type guard for {@link RequestError}.
 */
export function isRequestError(error: unknown): error is RequestError {
  return isErrorType(RequestError, error);
}

/**
 * Extract a {@link RequestError} from an unknown error value, following nested causes.
 */
export function getRequestError(error: unknown): null | RequestError {
  return unwrapErrorType(RequestError, error);
}
