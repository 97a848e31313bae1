/**
 * Transport entrypoint: exports the default fetch-based transport and its options.
 * @module
 */
export { FetchClient, type FetchClientOptions } from './client.js';
export { mergeHeaderOptions } from './utils.js';
