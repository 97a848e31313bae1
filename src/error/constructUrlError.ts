import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a section or action cannot be used as a path segment.
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  static name = 'ConstructURLError';
  /** The offending segment */
  #segment: string;

  /** Creates a new instance of a ConstructURLError with the rejected segment */
  constructor(message: string, segment: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#segment = segment;
  }

  /** The segment that was rejected */
  get segment(): string {
    return this.#segment;
  }
}

/**
 * Extract a {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): ConstructURLError | null {
  return unwrapErrorType(ConstructURLError, error);
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}
