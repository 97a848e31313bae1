import { isErrorType } from './isErrorType.js';

/**
 * Error raised when the transport's own timeout expires before a response arrives.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';
  /** Timeout that expired, in milliseconds */
  #timeout: number;

  /** Creates a new TimeoutError for the expired timeout */
  constructor(timeout: number, opts?: ErrorOptions) {
    super(`error request timed out after ${timeout}ms`, opts);
    this.#timeout = timeout;
  }

  /** Timeout that expired, in milliseconds */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
