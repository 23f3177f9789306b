#!/usr/bin/env node
import { createProgram } from './cli/program.js';

createProgram({ stdout: process.stdout })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.stderr.write(`error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
