/**
 * Narrows to a plain JSON object (not `null`, not an array).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the deepest `message` found along an error's `cause` chain.
 */
export function rootMessage(err: Error): string {
  let message = err.message;
  let current: unknown = err.cause;
  while (current instanceof Error) {
    message = current.message || message;
    current = current.cause;
  }

  return message;
}

/**
 * Returns the first string `code` found along an error's `cause` chain, as set
 * by Node's socket and DNS errors (`ECONNREFUSED`, `ENOTFOUND`, …).
 */
export function errorCode(err: unknown): string | undefined {
  let current: unknown = err;
  while (current instanceof Error) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }

    current = current.cause;
  }

  return undefined;
}
