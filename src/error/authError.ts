import { isErrorType } from './isErrorType.js';
import { ShipthisError } from './shipthisError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the API rejects the credentials (HTTP 401) or the
 * permissions (HTTP 403) of a request.
 */
export class AuthError extends ShipthisError {
  /** AuthError error-name */
  static name = 'AuthError';
}

/**
 * Type guard for {@link AuthError}.
 */
export function isAuthError(error: unknown): error is AuthError {
  return isErrorType(AuthError, error);
}

/**
 * Extract an {@link AuthError} from an unknown error value, following nested causes.
 */
export function getAuthError(error: unknown): null | AuthError {
  return unwrapErrorType(AuthError, error);
}
