/**
 * Temporal expression resolution.
 */

export * from './types.js';
export * from './config.js';
export * from './context.js';
export * from './resolve.js';
