/**
 * Interface exports
 */

export * from './orchestrator.js';
export * from './stores.js';
