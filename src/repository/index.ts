/**
 * Repository exports
 */

export * from './raw-store.js';
export * from './warehouse-repository.js';
