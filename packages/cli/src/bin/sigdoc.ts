#!/usr/bin/env node

import { createProgram } from '../program.js';
import { isCommandRuntimeError, renderCommandRuntimeError } from '../lib/command-runtime.js';

try {
  createProgram().parse(process.argv);
} catch (err) {
  if (!isCommandRuntimeError(err)) throw err;
  renderCommandRuntimeError(err);
  process.exitCode = err.exitCode;
}
