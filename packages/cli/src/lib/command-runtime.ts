import chalk, { Chalk } from 'chalk';

interface ExitCommandErrorOptions {
  json?: boolean;
  message: string;
  exitCode?: number;
  jsonExtra?: Record<string, unknown>;
  /** False renders the human message without color (--no-color). */
  color?: boolean;
  render?: boolean;
}

/** Process boundary for commands: working directory and output streams. */
export interface CommandIO {
  cwd: string;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export function defaultCommandIO(): CommandIO {
  return {
    cwd: process.cwd(),
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
  };
}

export class CommandRuntimeError extends Error {
  readonly json: boolean;
  readonly exitCode: number;
  readonly jsonExtra?: Record<string, unknown>;
  readonly color: boolean;
  readonly render: boolean;

  constructor(options: ExitCommandErrorOptions) {
    super(options.message);
    this.name = 'CommandRuntimeError';
    this.json = options.json ?? false;
    this.exitCode = options.exitCode ?? 1;
    this.jsonExtra = options.jsonExtra;
    this.color = options.color ?? true;
    this.render = options.render ?? true;
  }
}

export function isCommandRuntimeError(error: unknown): error is CommandRuntimeError {
  return error instanceof CommandRuntimeError;
}

export function renderCommandRuntimeError(error: CommandRuntimeError, io: CommandIO = defaultCommandIO()): void {
  if (!error.render) {
    return;
  }

  if (error.json) {
    io.stdout(JSON.stringify({ success: false, error: error.message, ...(error.jsonExtra ?? {}) }));
    return;
  }

  const colors = error.color ? chalk : new Chalk({ level: 0 });
  io.stderr(colors.red(`✗ ${error.message}`));
}

export function exitCommandError(options: ExitCommandErrorOptions): never {
  throw new CommandRuntimeError(options);
}

export function exitCommand(exitCode = 0, message?: string): never {
  throw new CommandRuntimeError({
    message: message ?? `Command exited with code ${exitCode}`,
    exitCode,
    render: false,
  });
}
