/**
 * Absolute date-time expressions.
 */

export * from './types.js';
export * from './separators.js';
export * from './civil.js';
export * from './fields.js';
