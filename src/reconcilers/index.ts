/**
 * Reconcilers module - keeps monitor version tags in sync with services
 *
 * @module reconcilers
 */

export * as versions from './versions/index.js';
export * as monitors from './monitors/index.js';
export * as tags from './tags/index.js';
export * as runner from './runner/index.js';
