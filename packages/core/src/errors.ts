/**
 * Error types raised at the file boundary.
 *
 * The rule engine never throws. Parsing and reading do, and the run
 * orchestrator catches both per file so one bad file never aborts a run.
 */

export type SigdocErrorCode = 'PARSE_ERROR' | 'IO_ERROR';

export abstract class SigdocError extends Error {
  abstract readonly code: SigdocErrorCode;
  readonly filePath?: string;

  constructor(message: string, filePath?: string) {
    super(message);
    this.filePath = filePath;
  }
}

export interface ParseErrorOptions {
  /** 1-based line of the first syntax error. */
  line: number;
  filePath?: string;
}

export class ParseError extends SigdocError {
  readonly code = 'PARSE_ERROR';
  readonly line: number;

  constructor(message: string, options: ParseErrorOptions) {
    super(message, options.filePath);
    this.name = 'ParseError';
    this.line = options.line;
  }

  /** Same error, attributed to a file. */
  withFilePath(filePath: string): ParseError {
    return new ParseError(this.message, { line: this.line, filePath });
  }
}

export class IOError extends SigdocError {
  readonly code = 'IO_ERROR';
  override readonly cause: unknown;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, filePath);
    this.name = 'IOError';
    this.cause = cause;
  }
}

export function isSigdocError(error: unknown): error is SigdocError {
  return error instanceof SigdocError;
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}

export function isIOError(error: unknown): error is IOError {
  return error instanceof IOError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
