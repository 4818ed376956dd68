/**
 * Pipeline Orchestrator interface for the sales warehouse pipeline
 */

import { RawStoreLocator, RunOptions, RunReport, RunResult } from '../types/index.js';

/**
 * Pipeline Orchestrator interface
 * Runs the entity family chains and publishes their output
 */
export interface IPipelineOrchestrator {
  runPipeline(locator: RawStoreLocator, runId: string, options?: RunOptions): Promise<RunResult>;
}

/**
 * Destination for the per-run report
 */
export interface RunReportSink {
  publish(report: RunReport): void | Promise<void>;
}
