/**
 * Core entrypoint: exports the request executor and its configuration.
 * Import from here if you only need the executor without section clients or error helpers.
 * @module
 */

/**
 * Constructor options accepted by {@link RequestExecutor}.
 */
export type { RequestExecutorProps } from './executor.js';

/**
 * Executes `POST {baseUrl}/{section}/{action}.json` calls and normalizes server failures.
 */
export { API_KEY_FIELD, DEFAULT_BASE_URL, RequestExecutor } from './executor.js';
