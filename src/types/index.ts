/**
 * Main types export for the sales warehouse pipeline
 */

// Common types and enums
export * from './common.js';

// Raw Store types
export * from './raw.js';

// Cleansed and canonical entities
export * from './entities.js';

// Star schema types
export * from './warehouse.js';

// Data quality types
export * from './quality.js';

// Error types
export * from './errors.js';

// Run orchestration types
export * from './pipeline.js';
