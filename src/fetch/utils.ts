import type { HeaderOptions } from '../types/request.js';

/** Turns a header value into a string, or `null` for values a header cannot carry. */
function toHeaderValue(value: unknown): string | null {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    default:
      return null;
  }
}

/** Normalizes `Headers`, tuple arrays and plain records into one iterable. */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map(([key, value]): [string, unknown] => [key, value]);
  }

  return Object.entries(headers);
}

/**
 * Merges default and per-request headers into a single `Headers` instance.
 * Later sources win; a `null` or `undefined` value removes the header.
 */
export function mergeHeaderOptions(...sources: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const source of sources) {
    for (const [key, value] of toEntries(source)) {
      if (value == null) {
        merged.delete(key);
        continue;
      }

      const clean = toHeaderValue(value);
      if (clean !== null) {
        merged.set(key, clean);
      }
    }
  }

  return merged;
}
