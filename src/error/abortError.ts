import { isErrorType } from './isErrorType.js';

/**
 * Error used as abort reason when a merged signal fires without one of its own.
 *
 * Native signals always carry a reason once aborted (`abort()` without an
 * argument sets a `DOMException` named `AbortError`), so this only shows up with
 * signal implementations that abort without setting `reason`.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
