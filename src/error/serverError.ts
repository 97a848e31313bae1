import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * HTTP error for responses in the 5xx range. The API reports its own failures
 * this way, so this is the only status failure the executor normalizes.
 */
export class ServerError extends HTTPError {
  /** ServerError error-name */
  static name = 'ServerError';
}

/**
 * Type guard for {@link ServerError}.
 */
export function isServerError(error: unknown): error is ServerError {
  return isErrorType(ServerError, error);
}

/**
 * Extract a {@link ServerError} from an unknown error value, following nested causes.
 */
export function getServerError(error: unknown): ServerError | null {
  return unwrapErrorType(ServerError, error);
}
