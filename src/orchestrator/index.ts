/**
 * Orchestrator exports
 */

export * from './pipeline-orchestrator.js';
