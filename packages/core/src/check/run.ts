/**
 * Run orchestration across paths and files.
 *
 * Every file goes through checkFile independently. Parse and read errors
 * are caught at the file boundary, logged, and collected in the report;
 * only the aggregator carries state from one file to the next.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { isParseError, isSigdocError, type SigdocError, type SigdocErrorCode } from '../errors.js';
import type { Logger } from '../logger.js';
import {
  DEFAULT_IGNORE_FILE,
  IgnoreFilter,
  loadIgnoreFile,
  type IgnorePattern,
} from '../discovery/ignore.js';
import { discoverPythonFiles } from '../discovery/walk.js';
import { RunAggregator, type RunTotals } from './aggregator.js';
import { checkFile, readSourceFile, type CheckOptions, type FileReport, type ReadSource } from './check-source.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunOptions extends CheckOptions {
  ignoredFiles: readonly string[];
  ignoredDirectories: readonly string[];
  /**
   * Patterns applied under every root. When unset, each directory root's
   * own .gitignore is used if it has one.
   */
  ignorePatterns?: readonly IgnorePattern[];
}

export interface RunDeps {
  logger: Logger;
  /** Base for relative paths (default: process.cwd()). */
  cwd?: string;
  readSource?: ReadSource;
}

export interface FileFailure {
  path: string;
  code: SigdocErrorCode;
  message: string;
  /** Line of the syntax error, for parse failures. */
  line?: number;
}

export interface RunReport {
  files: FileReport[];
  failures: FileFailure[];
  /** Supplied paths that do not exist. */
  invalidPaths: string[];
  totals: RunTotals;
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

export function runCheck(paths: readonly string[], options: RunOptions, deps: RunDeps): RunReport {
  const { logger } = deps;
  const cwd = deps.cwd ?? process.cwd();
  const readSource = deps.readSource ?? readSourceFile;
  const aggregator = new RunAggregator();
  const files: FileReport[] = [];
  const failures: FileFailure[] = [];
  const invalidPaths: string[] = [];
  const visited = new Set<string>();

  const fail = (error: SigdocError, filePath: string): void => {
    logger.warn(`Skipping ${filePath}: ${error.message}`);
    failures.push(toFailure(error, filePath));
  };

  for (const input of paths) {
    const root = path.resolve(cwd, input);
    if (!fs.existsSync(root)) {
      logger.warn(`Invalid path: ${input}`);
      invalidPaths.push(input);
      continue;
    }

    const filter = new IgnoreFilter({
      ignoredFiles: options.ignoredFiles,
      ignoredDirectories: options.ignoredDirectories,
      patterns: options.ignorePatterns ?? rootIgnorePatterns(root, logger),
    });

    const discovered = discoverPythonFiles(root, filter, (error) => {
      fail(error, error.filePath ?? root);
    });
    logger.debug(`Discovered ${discovered.length} Python files`, { root });

    for (const filePath of discovered) {
      if (visited.has(filePath)) continue;
      visited.add(filePath);

      try {
        const report = checkFile(filePath, options, readSource);
        aggregator.recordFile(report);
        files.push(report);
        logger.debug(`Checked ${filePath}`, {
          functions: report.functionsSeen,
          findings: report.findingCount,
        });
      } catch (error) {
        if (!isSigdocError(error)) throw error;
        aggregator.recordFailure();
        fail(error, filePath);
      }
    }
  }

  return { files, failures, invalidPaths, totals: aggregator.snapshot() };
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

function rootIgnorePatterns(root: string, logger: Logger): IgnorePattern[] {
  const ignoreFile = path.join(root, DEFAULT_IGNORE_FILE);
  if (!fs.existsSync(ignoreFile) || !fs.statSync(ignoreFile).isFile()) return [];
  try {
    return loadIgnoreFile(ignoreFile);
  } catch (error) {
    if (!isSigdocError(error)) throw error;
    logger.warn(`Ignoring unreadable ${ignoreFile}: ${error.message}`);
    return [];
  }
}

function toFailure(error: SigdocError, filePath: string): FileFailure {
  const failure: FileFailure = { path: filePath, code: error.code, message: error.message };
  if (isParseError(error)) failure.line = error.line;
  return failure;
}
