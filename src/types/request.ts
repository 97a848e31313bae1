import type { FetchClientOptions } from '../fetch/client.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null>;

/** Options accepted by a single transport call. */
export interface FetchOptions extends Omit<RequestInit, 'headers'> {
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Response handed back by a transport. */
export type FetchResponse = Response;

/**
 * Runtime configuration payload accepted by `RequestExecutor.config`.
 * - `fetchOpts`: default transport options (headers, timeout).
 */
export interface Config {
  fetchOpts?: FetchClientOptions;
}

/** Contract for HTTP transports used by RequestExecutor. */
export interface FetchClientProviderDefinition {
  /** Executes a POST request against an endpoint relative to the bound base URL. */
  post: (endpoint: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Updates default options for the provider. */
  config: (opts: FetchClientOptions) => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the transport, bound to a base-url + options */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
