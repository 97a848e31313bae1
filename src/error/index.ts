/**
 * Error entrypoint: exports the normalized API error, transport errors and helpers
 * for identifying and unwrapping error types.
 * @module
 */

/** Error thrown into a merged signal that fired without a reason. */
export { AbortError, isAbortError } from './abortError.js';
/** Normalized error for server failures, and its helpers. */
export {
  ApiError,
  type ApiErrorBody,
  type ApiErrorKind,
  getApiError,
  isApiError,
  UNSTRUCTURED_NAME,
  UNSTRUCTURED_STATUS,
} from './apiError.js';
/** Tagged view of executor errors. */
export { type ClassifiedError, classifyError } from './classifyError.js';
/** Error for a section or action that is not a valid path segment. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Error representing a non-2xx HTTP response. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error representing a 5xx HTTP response. */
export { getServerError, isServerError, ServerError } from './serverError.js';
/** Error thrown when the transport timeout expires. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when a value does not match a schema. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
