import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * How an {@link ApiError} was built:
 * - `structured`: the server sent a complete error body and its fields are used as-is.
 * - `unstructured`: the body was missing, unparseable or incomplete, so the fields
 *   were synthesized from the transport error.
 */
export type ApiErrorKind = 'structured' | 'unstructured';

/** Error body the API documents for failed calls. */
export interface ApiErrorBody {
  message: string;
  code: number;
  status: string;
  name: string;
}

/** Status reported for a server failure that carried no usable error body. */
export const UNSTRUCTURED_STATUS = 'ServerError';

/** Name reported for a server failure that carried no usable error body. */
export const UNSTRUCTURED_NAME = 'ServerException';

/**
 * Normalized error for every failure the API answered with a server-error status.
 *
 * `name` is the name the API reported (e.g. `Invalid_Key`), not the class name;
 * use {@link isApiError} or `instanceof` to detect the class.
 */
export class ApiError extends Error {
  /** ApiError error-name */
  static name = 'ApiError';
  /** API error code */
  readonly code: number;
  /** API status, `error` for most API failures */
  readonly status: string;
  /** Whether the fields came from the server or were synthesized */
  readonly kind: ApiErrorKind;

  /** Creates a new ApiError from an error body, with the transport error as cause */
  constructor(body: ApiErrorBody, kind: ApiErrorKind, opts?: ErrorOptions) {
    super(body.message, opts);
    this.name = body.name;
    this.code = body.code;
    this.status = body.status;
    this.kind = kind;
  }
}

/**
 * Type guard for {@link ApiError}.
 */
export function isApiError(error: unknown): error is ApiError {
  return isErrorType(ApiError, error);
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): ApiError | null {
  return unwrapErrorType(ApiError, error);
}
