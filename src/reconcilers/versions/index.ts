/**
 * Version fetching
 *
 * @module reconcilers/versions
 */

export { fetchVersion, DEFAULT_FETCH_TIMEOUT_MS } from './fetch.js';
export type { FetchVersionOptions } from './fetch.js';
