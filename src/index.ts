/**
 * Sales Warehouse Pipeline
 *
 * Main entry point: consolidates CRM and ERP extracts into a star schema
 */

// Export all types
export * from './types/index.js';

// Export configuration
export * from './config/index.js';

// Export interfaces
export * from './interfaces/index.js';

// Export services
export * from './services/index.js';

// Export repository
export * from './repository/index.js';

// Export orchestrator
export * from './orchestrator/index.js';

// Export utilities
export * from './utils/index.js';
