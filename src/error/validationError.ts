import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { ShipthisError } from './shipthisError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Renders issues as `path: message` pairs, e.g. `collection: too short`. */
function formatIssues(issues: readonly StandardSchemaV1.Issue[]): string {
  return issues
    .map((issue) => {
      const path = (issue.path ?? [])
        .map((segment) => (typeof segment === 'object' ? String(segment.key) : String(segment)))
        .join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Error representing arguments or configuration that failed a schema check.
 * Nothing is sent to the API when this is returned.
 */
export class ValidationError extends ShipthisError {
  /** ValidationError error-name */
  static name = 'ValidationError';
  /** Schema validation issues */
  readonly issues: StandardSchemaV1.Issue[];

  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length ? `${message}; ${formatIssues(issues)}` : message, opts);
    this.issues = [...issues];
  }
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract a {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
