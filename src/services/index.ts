/**
 * Service exports for the sales warehouse pipeline
 */

export * from './quality-issue-log.js';
export * from './row-reader.js';
export * from './cleansing-service.js';
export * from './deduplication-service.js';
export * from './business-rule-service.js';
export * from './dimensional-assembly-service.js';
export * from './quality-validation-service.js';
export * from './run-report-sink.js';
