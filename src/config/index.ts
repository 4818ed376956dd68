/**
 * Configuration exports
 */

export * from './code-lookups.js';
export * from './source-schemas.js';
export * from './pipeline-config.js';
