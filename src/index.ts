/**
 * Root entrypoint: re-exports the executor, section clients, transport and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Constructor options accepted by {@link RequestExecutor}.
 */
export type { RequestExecutorProps } from './core/executor.js';

/**
 * Executes `POST {baseUrl}/{section}/{action}.json` calls and normalizes server failures.
 */
export { API_KEY_FIELD, DEFAULT_BASE_URL, RequestExecutor } from './core/executor.js';

/**
 * Errors and helpers for telling failures apart.
 */
export * from './error/index.js';

/**
 * Default fetch-based transport.
 */
export { FetchClient, type FetchClientOptions } from './fetch/client.js';

/**
 * Section clients and the factory bundling them.
 */
export * from './sections/index.js';

/** JSON value and payload types. */
export type { JsonValue, RequestPayload } from './types/json.js';

/** Transport contract and configuration types. */
export type {
  Config,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
  HeaderOptions,
} from './types/request.js';

/** Error-first result tuples. */
export { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './utils/wrap.js';
