import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import {
  CommandRuntimeError,
  exitCommand,
  renderCommandRuntimeError,
  type CommandIO,
} from '../lib/command-runtime.js';

function captureIO() {
  const out: string[] = [];
  const err: string[] = [];
  const io: CommandIO = { cwd: '/work', stdout: (line) => out.push(line), stderr: (line) => err.push(line) };
  return { io, out, err };
}

describe('renderCommandRuntimeError', () => {
  it('prints plain text when color is off', () => {
    const { io, out, err } = captureIO();
    renderCommandRuntimeError(new CommandRuntimeError({ message: 'No valid paths to check', color: false }), io);
    expect(err).toEqual(['✗ No valid paths to check']);
    expect(out).toEqual([]);
  });

  it('colors the message red by default', () => {
    const { io, err } = captureIO();
    renderCommandRuntimeError(new CommandRuntimeError({ message: 'boom' }), io);
    expect(err).toEqual([chalk.red('✗ boom')]);
  });

  it('prints a JSON payload with extra fields in JSON mode', () => {
    const { io, out, err } = captureIO();
    const error = new CommandRuntimeError({ message: 'bad', json: true, jsonExtra: { invalidPaths: ['x'] } });
    renderCommandRuntimeError(error, io);
    expect(out).toEqual(['{"success":false,"error":"bad","invalidPaths":["x"]}']);
    expect(err).toEqual([]);
  });

  it('prints nothing for a plain exit', () => {
    const { io, out, err } = captureIO();
    try {
      exitCommand(1);
    } catch (error) {
      if (!(error instanceof CommandRuntimeError)) throw error;
      expect(error.exitCode).toBe(1);
      renderCommandRuntimeError(error, io);
    }
    expect(out).toEqual([]);
    expect(err).toEqual([]);
  });
});
