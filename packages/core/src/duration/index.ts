/**
 * Relative duration parsing.
 */

export * from './constants.js';
export * from './units.js';
export * from './duration.js';
