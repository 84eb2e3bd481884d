/** Any error class, abstract or concrete, regardless of constructor arity. */
export type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

/**
 * Walks an unknown error value and its nested `cause` chain, returning the
 * first link that is an instance of `errorClass`.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
