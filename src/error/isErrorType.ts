import { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Generic type guard to check if an unknown error, or anything in its `cause`
 * chain, is an instance of a specific error class.
 */
export function isErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): err is T {
  return unwrapErrorType(errorClass, err) !== null;
}
