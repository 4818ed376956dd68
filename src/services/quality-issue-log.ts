/**
 * Append-only collection of quality issues for one pipeline run
 */

import { v4 as uuidv4 } from 'uuid';
import {
  EntityFamily,
  IssueDetails,
  IssueKind,
  IssueScope,
  IssueTotals,
  QualityIssue,
  Severity,
  StageName
} from '../types/index.js';

export interface IssueFilters {
  family?: EntityFamily;
  stage?: StageName;
  severity?: Severity;
  rule?: string;
}

/**
 * Records issues for a fixed family, stage and entity
 */
export interface IssueRecorder {
  readonly scope: IssueScope;
  info(rule: string, kind: IssueKind, message: string, details?: IssueDetails): QualityIssue;
  warning(rule: string, kind: IssueKind, message: string, details?: IssueDetails): QualityIssue;
  fatal(rule: string, kind: IssueKind, message: string, details?: IssueDetails): QualityIssue;
  /** Recorder for the same family and stage on another entity */
  forEntity(entity: string): IssueRecorder;
  /** Issues recorded through this recorder and the recorders derived from it */
  recorded(): readonly QualityIssue[];
}

export class QualityIssueLog {
  private issues: QualityIssue[] = [];

  constructor(public readonly runId: string) {}

  record(
    scope: IssueScope,
    severity: Severity,
    rule: string,
    kind: IssueKind,
    message: string,
    details: IssueDetails = {}
  ): QualityIssue {
    const issue: QualityIssue = {
      id: uuidv4(),
      runId: this.runId,
      family: scope.family,
      stage: scope.stage,
      entity: details.entity ?? scope.entity,
      businessKey: details.businessKey ?? null,
      rule,
      kind,
      severity,
      message,
      detectedAt: new Date()
    };

    if (details.field !== undefined) issue.field = details.field;
    if (details.rowOffset !== undefined) issue.rowOffset = details.rowOffset;
    if (details.originalValue !== undefined) issue.originalValue = details.originalValue;
    if (details.correctedValue !== undefined) issue.correctedValue = details.correctedValue;

    this.issues.push(issue);
    return issue;
  }

  recorder(scope: IssueScope): IssueRecorder {
    return new ScopedIssueRecorder(this, scope, []);
  }

  all(): QualityIssue[] {
    return [...this.issues];
  }

  filter(filters: IssueFilters): QualityIssue[] {
    return this.issues.filter(issue =>
      (filters.family === undefined || issue.family === filters.family) &&
      (filters.stage === undefined || issue.stage === filters.stage) &&
      (filters.severity === undefined || issue.severity === filters.severity) &&
      (filters.rule === undefined || issue.rule === filters.rule)
    );
  }

  totals(): IssueTotals {
    const totals: IssueTotals = { info: 0, warning: 0, fatal: 0 };
    for (const issue of this.issues) {
      totals[issue.severity]++;
    }
    return totals;
  }

  get size(): number {
    return this.issues.length;
  }
}

class ScopedIssueRecorder implements IssueRecorder {
  constructor(
    private readonly log: QualityIssueLog,
    public readonly scope: IssueScope,
    private readonly sink: QualityIssue[]
  ) {}

  info(rule: string, kind: IssueKind, message: string, details?: IssueDetails): QualityIssue {
    return this.add('info', rule, kind, message, details);
  }

  warning(rule: string, kind: IssueKind, message: string, details?: IssueDetails): QualityIssue {
    return this.add('warning', rule, kind, message, details);
  }

  fatal(rule: string, kind: IssueKind, message: string, details?: IssueDetails): QualityIssue {
    return this.add('fatal', rule, kind, message, details);
  }

  forEntity(entity: string): IssueRecorder {
    return new ScopedIssueRecorder(this.log, { ...this.scope, entity }, this.sink);
  }

  recorded(): readonly QualityIssue[] {
    return this.sink;
  }

  private add(
    severity: Severity,
    rule: string,
    kind: IssueKind,
    message: string,
    details?: IssueDetails
  ): QualityIssue {
    const issue = this.log.record(this.scope, severity, rule, kind, message, details);
    this.sink.push(issue);
    return issue;
  }
}
