import type { JsonValue } from '../types/json.js';
import type { FetchResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads a successful response body and parses it as JSON.
 *
 * The API answers every call with JSON, so the `Content-Type` header is not
 * consulted. Whatever shape the body has (object, array, scalar) is returned
 * unchanged.
 *
 * - 204 and 205 resolve to `[null, null]`, as does an empty body.
 * - A body that cannot be read or is not valid JSON resolves to `[Error, null]`
 *   with the original failure as `cause`.
 */
export async function getResponseData<ReturnValue = JsonValue>(
  response: FetchResponse,
): SafeWrapAsync<Error, ReturnValue> {
  // Per HTTP spec, 204 + 205 shouldn't have a body
  if (response.status === 204 || response.status === 205) {
    return [null, null as ReturnValue];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text) {
    return [null, null as ReturnValue];
  }

  const [errJson, json] = safeWrap<Error, ReturnValue>(() => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, json];
}
