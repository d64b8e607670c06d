/**
 * Temporal expression resolution for time banners.
 * This package contains pure TypeScript logic with no framework dependencies;
 * the only I/O is the explicit abbreviation table loader.
 */

/**
 * Re-export parse error and result types.
 */
export * from './errors/index.js';

/**
 * Re-export UTC offset parsing and the abbreviation table.
 */
export * from './zones/index.js';

/**
 * Re-export the relative duration parser.
 */
export * from './duration/index.js';

/**
 * Re-export the absolute date-time parser.
 */
export * from './absolute/index.js';

/**
 * Re-export the expression resolver.
 */
export * from './resolve/index.js';
