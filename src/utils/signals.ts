import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after
 * `timeoutMs`. Returns `null` when the timeout is `0`, negative or absent.
 *
 * When `until` aborts first the timer is cleared, so a settled request leaves
 * no pending timer behind.
 */
export function createTimeoutSignal(timeoutMs?: number, until?: AbortSignal): AbortSignal | null {
  if (!timeoutMs || timeoutMs <= 0) {
    return null;
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), { once: true });
  until?.addEventListener('abort', () => clearTimeout(timeout), { once: true });

  return controller.signal;
}

/**
 * Merges several signals into one that aborts as soon as any source does,
 * carrying that source's `reason`.
 *
 * - No active signals gives `null`, a single one is returned as-is.
 * - Listeners on the sources are removed once the merged signal aborts.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): AbortSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return active[0];
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener(
    'abort',
    () => {
      for (const remove of listeners) {
        remove();
      }
    },
    { once: true },
  );

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return controller.signal;
}
