/**
 * API module exports
 */

export * from './client.js';
export * from './types.js';
