import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { ApiErrorBody } from '../error/apiError.js';
import type { ValidationError } from '../error/validationError.js';
import { isRecord } from './isRecord.js';
import { validator } from './validator.js';
import { type SafeWrapAsync, safeWrap } from './wrap.js';

/** Fields of {@link ApiErrorBody} and the `typeof` each must have. */
const fields = {
  message: 'string',
  code: 'number',
  status: 'string',
  name: 'string',
} as const;

/**
 * Standard Schema for the error body the API sends with a failed call,
 * e.g. `{"status":"error","code":-1,"name":"Invalid_Key","message":"Invalid API key"}`.
 * Extra fields are dropped from the output.
 */
export const apiErrorBodySchema: StandardSchemaV1<unknown, ApiErrorBody> = {
  '~standard': {
    version: 1,
    vendor: 'mandrill-request',
    validate(value) {
      if (!isRecord(value)) {
        return { issues: [{ message: 'expected an object' }] };
      }

      const issues: StandardSchemaV1.Issue[] = [];
      for (const [key, type] of Object.entries(fields)) {
        if (typeof value[key] !== type) {
          issues.push({ message: `expected ${key} to be a ${type}`, path: [key] });
        }
      }

      const { message, code, status, name } = value;
      if (
        issues.length > 0 ||
        typeof message !== 'string' ||
        typeof code !== 'number' ||
        typeof status !== 'string' ||
        typeof name !== 'string'
      ) {
        return { issues };
      }

      return { value: { message, code, status, name } };
    },
  },
};

/**
 * Reads the text of a failed response as an API error body.
 *
 * Text that is not JSON (a proxy's HTML page, an empty body) is checked as the
 * raw string, so it fails the same way a JSON body of the wrong shape does.
 */
export function parseApiErrorBody(text: string): SafeWrapAsync<ValidationError, ApiErrorBody> {
  const [errJson, json] = safeWrap<Error, unknown>(() => JSON.parse(text));

  return validator(errJson ? text : json, apiErrorBodySchema);
}
