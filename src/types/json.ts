/** Any value `JSON.parse` can produce. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Request body supplied by a section client; serialized with `JSON.stringify`. */
export type RequestPayload = Record<string, unknown>;
