/**
 * Run-scoped counters. Owned by the orchestrator; the per-file pipeline
 * itself keeps no state between files.
 */

import type { FileReport } from './check-source.js';

export interface RunTotals {
  /** Files discovered and attempted, failed ones included. */
  files: number;
  functions: number;
  findings: number;
  failedFiles: number;
}

export class RunAggregator {
  private totals: RunTotals = { files: 0, functions: 0, findings: 0, failedFiles: 0 };

  recordFile(report: FileReport): void {
    this.totals.files++;
    this.totals.functions += report.functionsSeen;
    this.totals.findings += report.findingCount;
  }

  recordFailure(): void {
    this.totals.files++;
    this.totals.failedFiles++;
  }

  snapshot(): RunTotals {
    return { ...this.totals };
  }
}
