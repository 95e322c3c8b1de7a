/**
 * check command: compare function signatures with their docstrings
 */

import { Command } from 'commander';
import chalk, { Chalk } from 'chalk';
import {
  describeError,
  isIOError,
  loadIgnoreFile,
  runCheck,
  type IgnorePattern,
  type RunReport,
} from '@sigdoc/core';
import { createLogger } from '../lib/logger.js';
import { loadConfig, resolveSettings, type ResolvedSettings } from '../lib/config.js';
import { formatJsonReport, formatTextReport } from '../lib/render.js';
import {
  defaultCommandIO,
  exitCommand,
  exitCommandError,
  type CommandIO,
} from '../lib/command-runtime.js';

export interface CheckCommandOptions {
  files?: string[];
  names?: string[];
  ignoreDirs?: string[];
  ignoreFile?: string;
  verbose?: boolean;
  json?: boolean;
  /** False with --no-color. */
  color?: boolean;
  config?: string;
}

/** Exit code when at least one mismatch was found. */
export const EXIT_FINDINGS = 1;
/** Exit code when no supplied path could be checked, or the setup is invalid. */
export const EXIT_USAGE = 2;

export function registerCheckCommand(program: Command, io: CommandIO = defaultCommandIO()): void {
  program
    .command('check')
    .description('Check that function signatures match their docstrings')
    .argument('<paths...>', 'Python files or directories to check')
    .option('-f, --files <names...>', 'File names to skip')
    .option('-n, --names <names...>', 'Function names whose findings are suppressed')
    .option('-d, --ignore-dirs <names...>', 'Additional directory names to skip')
    .option('--ignore-file <path>', 'Ignore file with .gitignore syntax (default: .gitignore of each directory)')
    .option('-v, --verbose', 'Report untyped parameters and argument order, log each file')
    .option('--json', 'Output the report as JSON')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Config file (default: sigdoc.config.json)')
    .action((paths: string[], options: CheckCommandOptions) => {
      runCheckCommand(paths, options, io);
    });
}

/**
 * Run a check and print the report. Returns the report when no mismatch
 * was found; otherwise ends the command with a non-zero exit code.
 */
export function runCheckCommand(paths: string[], options: CheckCommandOptions, io: CommandIO): RunReport {
  const json = options.json ?? false;
  const color = options.color !== false;
  const colors = !color || json ? new Chalk({ level: 0 }) : chalk;

  const config = loadConfig(io.cwd, { configPath: options.config, json, color });
  const settings = resolveSettings(io.cwd, config, options);
  const logger = createLogger({
    verbose: settings.verbose,
    quiet: json,
    output: io.stdout,
    errorOutput: io.stderr,
    colors,
  });

  const report = runCheck(
    paths,
    {
      verbose: settings.verbose,
      ignoredFunctionNames: new Set(settings.ignoredFunctionNames),
      ignoredFiles: settings.ignoredFiles,
      ignoredDirectories: settings.ignoredDirectories,
      ignorePatterns: explicitIgnorePatterns(settings, json, color),
    },
    { logger, cwd: io.cwd },
  );

  if (report.invalidPaths.length === paths.length) {
    return exitCommandError({
      json,
      message: 'No valid paths to check',
      color,
      exitCode: EXIT_USAGE,
      jsonExtra: { invalidPaths: report.invalidPaths },
    });
  }

  if (json) {
    io.stdout(formatJsonReport(report));
  } else {
    for (const line of formatTextReport(report, { colors, cwd: io.cwd })) {
      io.stdout(line);
    }
  }

  if (report.totals.findings > 0) {
    return exitCommand(EXIT_FINDINGS, `Found ${report.totals.findings} mismatches`);
  }
  return report;
}

function explicitIgnorePatterns(
  settings: ResolvedSettings,
  json: boolean,
  color: boolean,
): IgnorePattern[] | undefined {
  if (settings.ignoreFile === undefined) return undefined;
  try {
    return loadIgnoreFile(settings.ignoreFile);
  } catch (err) {
    if (!isIOError(err)) throw err;
    return exitCommandError({
      json,
      color,
      message: `Cannot load ignore file: ${describeError(err)}`,
      exitCode: EXIT_USAGE,
    });
  }
}
