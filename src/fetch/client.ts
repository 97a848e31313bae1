import { HTTPError } from '../error/httpError.js';
import { ServerError } from '../error/serverError.js';
import type { FetchOptions, FetchResponse, HeaderOptions } from '../types/request.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Options to configure the {@link FetchClient} wrapper. */
export interface FetchClientOptions {
  /** Default headers sent with every request. */
  headers?: HeaderOptions;
  /**
   * Transport timeout in milliseconds; an expired timeout aborts the request
   * with a `TimeoutError`.
   * @default false
   */
  timeout?: number | false;
}

/**
 * Thin wrapper around the native `fetch` API that:
 * - prefixes all requests with a configured base URL,
 * - merges default and per-request headers,
 * - tells server failures (5xx) apart from other status failures,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchClient {
  /** Base URL prepended to all request paths. */
  #baseUrl: string;
  /** Default fetch options (headers, timeout). */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    if (!baseUrl.endsWith('/')) {
      baseUrl += '/';
    }

    this.#baseUrl = baseUrl;
    this.#opts = opts ?? {};
  }

  /**
   * Updates default fetch options (merged with existing headers).
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Executes a POST request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `users/ping.json`).
   * @param opts - Request options (body, headers, signal) merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(endpoint: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(endpoint, { ...opts, method: 'POST' });
  }

  /**
   * Core request implementation.
   *
   * Errors:
   * - Network / fetch errors (including an expired timeout) are wrapped in `Error`.
   * - 5xx responses become a `ServerError`.
   * - Any other non-2xx response becomes an `HTTPError`.
   */
  async #request(endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    const { headers: localHeaders, signal: localSignal, ...init } = opts;
    const headers = mergeHeaderOptions(this.#opts.headers, localHeaders);
    const timeout = createTimeoutSignal(this.#opts.timeout);
    const merged = mergeSignals([localSignal, timeout?.signal]);
    const url = this.constructPath(endpoint);

    const [err, res] = await safeWrapAsync(() =>
      fetch(url, {
        ...init,
        headers,
        ...(merged && { signal: merged.signal }),
      }),
    );
    timeout?.clear();
    merged?.clear();

    if (err) {
      return [new Error(`error wrapping ${opts.method} request in fetchClient`, { cause: err }), null];
    }

    if (res.status >= 500) {
      return [new ServerError(res, `error in ${opts.method} ${url} in fetchClient, status ${res.status}`), null];
    }

    if (!res.ok) {
      return [new HTTPError(res, `error in ${opts.method} ${url} in fetchClient, status ${res.status}`), null];
    }

    return [null, res];
  }

  /**
   * Joins the base URL and endpoint into a single URL string, stripping a
   * leading slash from the endpoint to avoid `//` in the URL.
   */
  private constructPath(endpoint: string): string {
    return `${this.#baseUrl}${endpoint.replace(/^\//, '')}`;
  }
}
