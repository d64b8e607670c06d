/**
 * UTC offsets and timezone abbreviations.
 */

export * from './types.js';
export * from './offset.js';
export * from './abbreviations.js';
export * from './loader.js';
