/**
 * Run report sinks
 *
 * The orchestrator hands every finished run's report to a sink. The console
 * sink prints a JSON summary; the in-memory sink keeps reports for inspection.
 */

import { RunReportSink } from '../interfaces/orchestrator.js';
import { RunReport } from '../types/index.js';

// ==================== Types ====================

/**
 * Configuration for the console sink
 */
export interface ConsoleRunReportSinkConfig {
  /** Include every quality issue instead of the totals only */
  includeIssues: boolean;
  /** JSON indentation */
  indent: number;
}

const DEFAULT_CONFIG: ConsoleRunReportSinkConfig = {
  includeIssues: false,
  indent: 2,
};

/**
 * Report without the issue list, for compact output
 */
export type RunReportSummary = Omit<RunReport, 'issues'> & { issueCount: number };

export function summarizeRunReport(report: RunReport): RunReportSummary {
  const { issues, ...rest } = report;
  return { ...rest, issueCount: issues.length };
}

// ==================== Sinks ====================

export class ConsoleRunReportSink implements RunReportSink {
  private config: ConsoleRunReportSinkConfig;

  constructor(config: Partial<ConsoleRunReportSinkConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  publish(report: RunReport): void {
    const payload = this.config.includeIssues ? report : summarizeRunReport(report);
    console.log('[RUN REPORT]', JSON.stringify(payload, null, this.config.indent));
  }
}

export class InMemoryRunReportSink implements RunReportSink {
  private reports: RunReport[] = [];

  publish(report: RunReport): void {
    this.reports.push(report);
  }

  getReports(): RunReport[] {
    return [...this.reports];
  }

  getLatest(): RunReport | undefined {
    return this.reports[this.reports.length - 1];
  }
}
