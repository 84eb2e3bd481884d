/**
 * Fetch entrypoint: exports the default transport and supporting types.
 * @module
 */
export type { FetchOptions } from '../types/request.js';
export { FetchClient } from './client.js';
export { mergeHeaderOptions } from './utils.js';
