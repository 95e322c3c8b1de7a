/**
 * Report rendering for `sigdoc check`: a colored text report and a JSON
 * report.
 */

import * as path from 'node:path';
import type { ChalkInstance } from 'chalk';
import { VERBOSE_ONLY_KINDS, type Finding, type RunReport } from '@sigdoc/core';

export interface TextReportOptions {
  colors: ChalkInstance;
  /** Paths below cwd are printed relative to it. */
  cwd: string;
}

export function formatTextReport(report: RunReport, options: TextReportOptions): string[] {
  const { colors, cwd } = options;
  const lines: string[] = [];

  for (const file of report.files) {
    if (file.functions.length === 0) continue;

    lines.push(colors.bold(`Checking file: ${displayPath(file.path, cwd)}`));
    for (const fn of file.functions) {
      lines.push(`    ${colors.cyan(`Function '${fn.functionName}'`)} (line ${fn.line}):`);
      for (const finding of fn.findings) {
        lines.push(`        - ${colorFinding(finding, colors)}`);
      }
    }
    lines.push('');
  }

  const { totals } = report;
  lines.push(colors.bold('Summary:'));
  lines.push(`    Checked ${totals.files} files with ${totals.functions} functions.`);
  const found = `    Found ${totals.findings} mismatches in docstrings.`;
  lines.push(totals.findings > 0 ? colors.red(found) : colors.green(found));
  if (totals.failedFiles > 0) {
    lines.push(colors.yellow(`    Skipped ${totals.failedFiles} files that could not be checked.`));
  }
  return lines;
}

export function formatJsonReport(report: RunReport): string {
  return JSON.stringify(report, null, 2);
}

function colorFinding(finding: Finding, colors: ChalkInstance): string {
  return VERBOSE_ONLY_KINDS.has(finding.kind) ? colors.gray(finding.message) : colors.red(finding.message);
}

function displayPath(filePath: string, cwd: string): string {
  const relative = path.relative(cwd, filePath);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) return filePath;
  return relative;
}
