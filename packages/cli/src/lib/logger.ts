/**
 * Logger implementation for CLI
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { Logger } from '@sigdoc/core';

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** Routes debug and info lines instead of console.log. */
  output?: (msg: string) => void;
  /** Routes warn and error lines instead of console.error. */
  errorOutput?: (msg: string) => void;
  /** Color instance; pass `new Chalk({ level: 0 })` for plain text. */
  colors?: ChalkInstance;
}

/**
 * Create a logger instance. Warnings go to stderr so that --json output
 * on stdout stays parseable.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const { verbose = false, quiet = false, output, errorOutput, colors = chalk } = opts;
  const write = output ?? ((msg: string) => console.log(msg));
  const writeErr = errorOutput ?? ((msg: string) => console.error(msg));

  return {
    debug(msg: string, data?: Record<string, unknown>) {
      if (verbose && !quiet) {
        const dataStr = data ? ` ${JSON.stringify(data)}` : '';
        write(colors.gray(`[debug] ${msg}${dataStr}`));
      }
    },

    info(msg: string, data?: Record<string, unknown>) {
      if (!quiet) {
        const dataStr = data && verbose ? ` ${JSON.stringify(data)}` : '';
        write(colors.blue(`[info] ${msg}${dataStr}`));
      }
    },

    warn(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      writeErr(colors.yellow(`[warn] ${msg}${dataStr}`));
    },

    error(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      writeErr(colors.red(`[error] ${msg}${dataStr}`));
    },
  };
}
