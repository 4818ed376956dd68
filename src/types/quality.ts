/**
 * Data quality types for the sales warehouse pipeline
 */

import { EntityFamily, IssueKind, Severity, StageName } from './common.js';
import { RawValue } from './raw.js';

/**
 * A single recorded violation or correction
 */
export interface QualityIssue {
  id: string;
  runId: string;
  family: EntityFamily;
  stage: StageName;
  /** Table or entity the issue was found on, e.g. crm_cust_info or dim_product */
  entity: string;
  businessKey: string | null;
  rule: string;
  kind: IssueKind;
  severity: Severity;
  message: string;
  field?: string;
  rowOffset?: number;
  originalValue?: RawValue;
  correctedValue?: RawValue;
  detectedAt: Date;
}

/**
 * Details supplied when recording an issue; scope fields come from the recorder
 */
export interface IssueDetails {
  entity?: string;
  businessKey?: string | null;
  field?: string;
  rowOffset?: number;
  originalValue?: RawValue;
  correctedValue?: RawValue;
}

/**
 * Scope an issue recorder is bound to
 */
export interface IssueScope {
  family: EntityFamily;
  stage: StageName;
  entity: string;
}

/**
 * Issue totals by severity
 */
export type IssueTotals = Record<Severity, number>;
