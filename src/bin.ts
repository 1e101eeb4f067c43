#!/usr/bin/env node
import { run } from './cli/program.js';
import { printError } from './cli/output.js';
import { errorMessage } from './errors.js';

run().catch((err: unknown) => {
  printError(errorMessage(err));
  process.exitCode = 1;
});
