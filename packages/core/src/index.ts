/**
 * @pagelang/core - Core library for pagelang
 *
 * Provides the MediaWiki API client, run configuration, title list reader and
 * the page language updater.
 */

export { VERSION } from './version.js';

// Re-export all modules
export * from './api/index.js';
export * from './config/index.js';
export * from './errors.js';
export * from './input/index.js';
export * from './language/index.js';
export * from './session.js';
