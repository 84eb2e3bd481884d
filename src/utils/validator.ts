import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an input value against a Standard Schema (zod, valibot, arktype…)
 * and wraps the outcome in a `[error, value]` tuple.
 *
 * - Sync and async schemas are both supported.
 * - A schema that throws gives a `ValidationError` with the thrown value as `cause`.
 * - Issues give a `ValidationError` prefixed with `message`.
 * - On success the schema's output (defaults applied, transforms run) is returned.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
  message = 'error validating data',
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [err, pending] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (err) {
    return [new ValidationError(`${message}: validator threw`, [], { cause: err }), null];
  }

  let result: ValidationResult;
  if (pending instanceof Promise) {
    const [errAsync, resolved] = await safeWrapAsync(() => pending);
    if (errAsync) {
      return [new ValidationError(`${message}: async validator threw`, [], { cause: errAsync }), null];
    }

    result = resolved;
  } else {
    result = pending;
  }

  if (result.issues) {
    return [new ValidationError(message, result.issues), null];
  }

  return [null, result.value];
}
