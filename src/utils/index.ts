/**
 * Utility exports
 */

export * from './collections.js';
export * from './dates.js';
