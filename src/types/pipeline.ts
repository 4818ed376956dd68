/**
 * Run orchestration types: stage outcomes, reports and results
 */

import {
  EntityFamily,
  FamilyStatus,
  RunStatus,
  StageName,
  StageStatus,
  WarehouseTableName
} from './common.js';
import { ErrorInfo } from './errors.js';
import { IssueTotals, QualityIssue } from './quality.js';
import { DimCustomer, DimProduct, FactSalesLine, KeyAssignmentTable } from './warehouse.js';

/**
 * Timing and counts recorded by the stage error boundary
 */
export interface StageReport {
  family: EntityFamily;
  stage: StageName;
  status: StageStatus;
  startedAt: Date;
  durationMs: number;
  recordCount: number;
  issueCount: number;
  error?: ErrorInfo;
}

/**
 * Result of one stage invocation, returned instead of thrown
 */
export type StageOutcome<T> =
  | { ok: true; value: T; report: StageReport }
  | { ok: false; error: ErrorInfo; report: StageReport };

export interface FamilyReport {
  family: EntityFamily;
  status: FamilyStatus;
  stages: StageReport[];
  durationMs: number;
  outputCount: number;
  blockedBy?: EntityFamily[];
  error?: ErrorInfo;
}

export interface PublishReport {
  committed: boolean;
  tables: WarehouseTableName[];
  version: number;
}

/**
 * Per-run record intended for an external log/monitoring sink
 */
export interface RunReport {
  runId: string;
  status: RunStatus;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  families: FamilyReport[];
  publish: PublishReport;
  issueTotals: IssueTotals;
  issues: QualityIssue[];
  error?: ErrorInfo;
}

export interface RunResult {
  runId: string;
  success: boolean;
  families: Record<EntityFamily, FamilyStatus>;
  report: RunReport;
}

/**
 * Options accepted by the run entry point
 */
export interface RunOptions {
  /** Aborts the run at the next stage boundary */
  signal?: AbortSignal;
}

// ==================== Family Outputs ====================

export interface CustomerFamilyOutput {
  rows: DimCustomer[];
  keysByCustomerId: ReadonlyMap<number, number>;
  assignments: KeyAssignmentTable;
}

export interface ProductFamilyOutput {
  rows: DimProduct[];
  keysByProductNumber: ReadonlyMap<string, number>;
  assignments: KeyAssignmentTable;
}

export interface SalesFamilyOutput {
  rows: FactSalesLine[];
}

export interface FamilyOutputs {
  customer: CustomerFamilyOutput;
  product: ProductFamilyOutput;
  sales: SalesFamilyOutput;
}

/**
 * Settled state of a family chain; never rejects
 */
export type FamilyOutcome<F extends EntityFamily> =
  | { family: F; status: 'succeeded'; output: FamilyOutputs[F]; report: FamilyReport }
  | { family: F; status: Exclude<FamilyStatus, 'succeeded'>; report: FamilyReport };
