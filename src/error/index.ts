/**
 * Error entrypoint: exports the client's error classes and helpers for identifying and unwrapping them.
 * @module
 */

export { AbortError, isAbortError } from './abortError.js';
export { AuthError, getAuthError, isAuthError } from './authError.js';
export { isErrorType } from './isErrorType.js';
export { getRequestError, isRequestError, RequestError } from './requestError.js';
export {
  type ErrorDetails,
  getShipthisError,
  isShipthisError,
  ShipthisError,
  type ShipthisErrorOptions,
} from './shipthisError.js';
export { isTimeoutError, TimeoutError } from './timeoutError.js';
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
