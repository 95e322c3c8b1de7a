/**
 * Per-file pipeline: parse → extract signature and docstring → compare.
 */

import * as fs from 'node:fs';
import { IOError, describeError, isParseError } from '../errors.js';
import { parseDocstring } from '../docstring/parser.js';
import { docstringOf } from '../python/docstring.js';
import { parseFunctions } from '../python/parser.js';
import { extractSignature } from '../python/signature.js';
import { compareSignature } from '../rules/engine.js';
import type { Finding } from '../rules/findings.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CheckOptions {
  verbose: boolean;
  /** Functions whose findings are suppressed. They still count as seen. */
  ignoredFunctionNames: ReadonlySet<string>;
}

export interface FunctionReport {
  functionName: string;
  line: number;
  findings: Finding[];
}

export interface FileReport {
  path: string;
  functionsSeen: number;
  /** Only functions with at least one finding, in source order. */
  functions: FunctionReport[];
  findingCount: number;
}

export const DEFAULT_CHECK_OPTIONS: CheckOptions = {
  verbose: false,
  ignoredFunctionNames: new Set(),
};

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Check every function in one source text.
 *
 * @throws ParseError (attributed to filePath) when the source does not parse
 */
export function checkSource(source: string, filePath: string, options: CheckOptions): FileReport {
  try {
    const functions = parseFunctions(source);
    const reports: FunctionReport[] = [];

    for (const fn of functions) {
      if (options.ignoredFunctionNames.has(fn.name)) continue;
      const findings = compareSignature(
        extractSignature(fn),
        parseDocstring(docstringOf(fn.node)),
        options,
      );
      if (findings.length > 0) {
        reports.push({ functionName: fn.name, line: fn.line, findings });
      }
    }

    return {
      path: filePath,
      functionsSeen: functions.length,
      functions: reports,
      findingCount: reports.reduce((sum, report) => sum + report.findings.length, 0),
    };
  } catch (error) {
    if (isParseError(error)) throw error.withFilePath(filePath);
    throw error;
  }
}

export type ReadSource = (filePath: string) => string;

export const readSourceFile: ReadSource = (filePath) => fs.readFileSync(filePath, 'utf-8');

/**
 * Read and check one file.
 *
 * @throws IOError when the file cannot be read
 * @throws ParseError when it does not parse
 */
export function checkFile(
  filePath: string,
  options: CheckOptions,
  readSource: ReadSource = readSourceFile,
): FileReport {
  let source: string;
  try {
    source = readSource(filePath);
  } catch (error) {
    throw new IOError(`Cannot read ${filePath}: ${describeError(error)}`, filePath, error);
  }
  return checkSource(source, filePath, options);
}
