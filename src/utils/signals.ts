import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Signal that aborts on timeout, plus a handle to cancel the pending timer. */
export interface TimeoutSignal {
  signal: AbortSignal;
  /** Cancels the timer once the request settled, so it cannot keep the process alive. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} once
 * `timeoutMs` has passed. Returns `null` when the timeout is `false`, `0` or unset.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
  const clear = () => clearTimeout(timeout);

  controller.signal.addEventListener('abort', clear, { once: true });

  return { signal: controller.signal, clear };
}

/** Signal following several sources, plus a handle to detach it from them. */
export interface MergedSignal {
  signal: AbortSignal;
  /** Removes the listeners added to the sources; the merged signal stops following them. */
  clear: () => void;
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * - No signals gives `null`; a single signal is returned as-is, with a no-op `clear`.
 * - Otherwise a new signal aborts as soon as any source does, carrying the
 *   source's `reason`. Native signals always have one once aborted; the
 *   {@link AbortError} fallback is for signal implementations that abort without it.
 *
 * Call `clear` once the request settled, so a long-lived source signal does not
 * keep one listener per request.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): MergedSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return { signal: active[0], clear: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const clear = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener('abort', clear, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, clear };
}
