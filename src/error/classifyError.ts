import { ApiError } from './apiError.js';

/**
 * Tagged view over the errors `RequestExecutor.execute` can return.
 *
 * - `structured`: the API answered with a complete error body.
 * - `unstructured`: the server failed without a usable error body.
 * - `transport`: anything else (connectivity, timeouts, non-5xx statuses), untouched.
 */
export type ClassifiedError =
  | { kind: 'structured'; error: ApiError }
  | { kind: 'unstructured'; error: ApiError }
  | { kind: 'transport'; error: unknown };

/**
 * Classifies an error returned by the executor so callers can switch on `kind`.
 * Only a top-level {@link ApiError} counts as normalized.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ApiError) {
    return error.kind === 'structured' ? { kind: 'structured', error } : { kind: 'unstructured', error };
  }

  return { kind: 'transport', error };
}
