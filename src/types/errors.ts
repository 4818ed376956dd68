/**
 * Error types and helpers for the sales warehouse pipeline
 *
 * Data-level problems never surface as errors: they become quality issues.
 * The classes below cover structural failures, run control and access.
 */

import { EntityFamily, IssueKind, StageName } from './common.js';

// ==================== Error Kind Enum ====================

export enum ErrorKind {
  /** Missing required table or column, or a key collision */
  STRUCTURAL = 'STRUCTURAL',
  /** Malformed date or non-numeric value */
  FORMAT = 'FORMAT',
  /** Measure mismatch */
  CONSISTENCY = 'CONSISTENCY',
  /** Unresolved dimension lookup */
  REFERENTIAL = 'REFERENTIAL',
  /** Multiple versions per business key */
  DUPLICATE = 'DUPLICATE',
  /** Another run holds the warehouse */
  LOCK_CONFLICT = 'LOCK_CONFLICT',
  /** Run cancelled between stages */
  ABORTED = 'ABORTED',
  /** Raw Store could not be reached or refused access */
  ACCESS = 'ACCESS',
  /** Invalid pipeline configuration */
  CONFIGURATION = 'CONFIGURATION',
  UNKNOWN = 'UNKNOWN',
}

// ==================== Error Info ====================

/**
 * Serializable error description carried by stage outcomes and run reports
 */
export interface ErrorInfo {
  kind: ErrorKind;
  name: string;
  message: string;
  fatal: boolean;
  family?: EntityFamily;
  stage?: StageName;
  stack?: string;
}

// ==================== Error Classes ====================

/**
 * Base error for the pipeline
 */
export class PipelineError extends Error {
  public readonly kind: ErrorKind;
  public readonly fatal: boolean;

  constructor(message: string, kind: ErrorKind, fatal: boolean = true) {
    super(message);
    this.name = 'PipelineError';
    this.kind = kind;
    this.fatal = fatal;
  }

  toErrorInfo(): ErrorInfo {
    return {
      kind: this.kind,
      name: this.name,
      message: this.message,
      fatal: this.fatal,
      stack: this.stack,
    };
  }
}

/**
 * Missing table, missing column or key collision; aborts the family chain
 */
export class StructuralError extends PipelineError {
  public readonly entity: string;
  public readonly missing: string[];

  constructor(entity: string, message: string, missing: string[] = []) {
    super(message, ErrorKind.STRUCTURAL, true);
    this.name = 'StructuralError';
    this.entity = entity;
    this.missing = missing;
  }
}

export class RunLockError extends PipelineError {
  public readonly heldBy: string;

  constructor(runId: string, heldBy: string) {
    super(`Run ${runId} rejected: warehouse is locked by run ${heldBy}`, ErrorKind.LOCK_CONFLICT, true);
    this.name = 'RunLockError';
    this.heldBy = heldBy;
  }
}

export class RunAbortedError extends PipelineError {
  constructor(runId: string, reason?: unknown) {
    const detail = reason instanceof Error ? reason.message : reason !== undefined ? String(reason) : 'aborted';
    super(`Run ${runId} aborted: ${detail}`, ErrorKind.ABORTED, true);
    this.name = 'RunAbortedError';
  }
}

export class RawStoreAccessError extends PipelineError {
  public readonly uri: string;

  constructor(uri: string, message: string) {
    super(message, ErrorKind.ACCESS, true);
    this.name = 'RawStoreAccessError';
    this.uri = uri;
  }
}

/**
 * Fatal quality issues recorded by a stage's validation
 */
export class QualityGateError extends PipelineError {
  public readonly entity: string;
  public readonly fatalCount: number;

  constructor(entity: string, fatalCount: number, firstMessage: string, kind: ErrorKind) {
    super(`${fatalCount} fatal quality issue(s) on ${entity}: ${firstMessage}`, kind, true);
    this.name = 'QualityGateError';
    this.entity = entity;
    this.fatalCount = fatalCount;
  }
}

export class ConfigurationError extends PipelineError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid pipeline configuration: ${problems.join('; ')}`, ErrorKind.CONFIGURATION, true);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

// ==================== Utility Functions ====================

/**
 * Error kind reported when a fatal quality issue fails a stage
 */
export const ISSUE_ERROR_KINDS: Record<IssueKind, ErrorKind> = {
  structural: ErrorKind.STRUCTURAL,
  format: ErrorKind.FORMAT,
  consistency: ErrorKind.CONSISTENCY,
  referential: ErrorKind.REFERENTIAL,
  duplicate: ErrorKind.DUPLICATE,
  completeness: ErrorKind.STRUCTURAL,
  uniqueness: ErrorKind.DUPLICATE,
};

export function categorizeError(error: unknown): ErrorKind {
  if (error instanceof PipelineError) {
    return error.kind;
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return ErrorKind.ABORTED;
  }
  return ErrorKind.UNKNOWN;
}

/**
 * Convert anything thrown into an ErrorInfo
 */
export function toErrorInfo(
  error: unknown,
  scope: { family?: EntityFamily; stage?: StageName } = {}
): ErrorInfo {
  if (error instanceof PipelineError) {
    return { ...error.toErrorInfo(), ...scope };
  }

  const kind = categorizeError(error);
  if (error instanceof Error) {
    return {
      kind,
      name: error.name,
      message: error.message,
      fatal: true,
      stack: error.stack,
      ...scope,
    };
  }

  return {
    kind,
    name: 'Error',
    message: String(error),
    fatal: true,
    ...scope,
  };
}

/**
 * Log an error with its pipeline context
 */
export function logError(error: unknown, context: Record<string, unknown> = {}): void {
  const info = toErrorInfo(error);

  console.error('[PipelineError]', {
    kind: info.kind,
    name: info.name,
    message: info.message,
    context,
  });
}
