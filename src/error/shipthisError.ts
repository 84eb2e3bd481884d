import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Extra context attached to an error, usually the parsed response body. */
export type ErrorDetails = Record<string, unknown>;

/** Options accepted by {@link ShipthisError} and its subclasses. */
export interface ShipthisErrorOptions extends ErrorOptions {
  /**
   * HTTP status, `0` for transport failures and local checks.
   * @default 0
   */
  statusCode?: number;
  /**
   * Parsed response body or other context.
   * @default {}
   */
  details?: ErrorDetails;
}

/**
 * Base error for everything the client reports. Errors that are neither an
 * authentication nor a request failure surface as this class directly.
 */
export class ShipthisError extends Error {
  /** ShipthisError error-name */
  static name = 'ShipthisError';
  /** HTTP status code, or `0` when no response was received */
  readonly statusCode: number;
  /** Parsed response body or other context */
  readonly details: ErrorDetails;

  constructor(message: string, { statusCode = 0, details = {}, ...opts }: ShipthisErrorOptions = {}) {
    super(message, opts);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * Type guard for {@link ShipthisError}, including its subclasses.
 */
export function isShipthisError(error: unknown): error is ShipthisError {
  return isErrorType(ShipthisError, error);
}

/**
 * Extract a {@link ShipthisError} from an unknown error value, following nested causes.
 */
export function getShipthisError(error: unknown): null | ShipthisError {
  return unwrapErrorType(ShipthisError, error);
}
