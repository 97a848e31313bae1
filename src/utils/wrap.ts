/**
 * Error-first tuple returned by every fallible call in this package, `[error, data]`.
 * Exactly one side is non-null.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Runs a promise factory and turns a rejection into the error side of the tuple.
 * @example
 * const [err, text] = await safeWrapAsync(() => response.text());
 */
export async function safeWrapAsync<ErrorType = Error, DataType = unknown>(
  promise: () => Promise<DataType>,
): SafeWrapAsync<ErrorType, DataType> {
  try {
    return [null, await promise()];
  } catch (error) {
    return [error as ErrorType, null];
  }
}

/**
 * Runs a synchronous function and turns a throw into the error side of the tuple.
 * @example
 * const [err, body] = safeWrap(() => JSON.stringify(payload));
 */
export function safeWrap<ErrorType = Error, DataType = unknown>(fn: () => DataType): SafeWrap<ErrorType, DataType> {
  try {
    return [null, fn()];
  } catch (error) {
    return [error as ErrorType, null];
  }
}
