/**
 * Top-level commander program for the sigdoc CLI.
 */

import { Command } from 'commander';
import { registerCheckCommand } from './commands/check.js';
import { defaultCommandIO, type CommandIO } from './lib/command-runtime.js';

export const CLI_VERSION = '0.1.0';

export function createProgram(io: CommandIO = defaultCommandIO()): Command {
  const program = new Command();
  program
    .name('sigdoc')
    .description('Report mismatches between Python function signatures and their docstrings')
    .version(CLI_VERSION);

  registerCheckCommand(program, io);
  return program;
}
