/**
 * Extract a specific error type from an unknown error value, following nested causes.
 *
 * Matches by `instanceof`, or by constructor name for classes loaded twice. The
 * instance `name` is not consulted, since {@link ApiError} carries the name the
 * API reported there.
 */
export function unwrapErrorType<T extends Error>(
  // biome-ignore lint/suspicious/noExplicitAny: errorClass needs to handle any type of class handling, hence the any class-type
  errorClass: new (...args: any[]) => T,
  err: unknown,
  shallow = false,
): T | null {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current instanceof errorClass || current.constructor?.name === errorClass.name) {
      return current as T;
    }

    if (shallow) {
      return null;
    }

    current = current.cause;
  }

  return null;
}
