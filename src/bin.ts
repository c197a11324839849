#!/usr/bin/env node
// Path: src/bin.ts
// pollgate executable

import { createProgram } from './cli/index.js';
import { getErrorMessage } from './utils/error.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`pollgate: ${getErrorMessage(err)}`);
    process.exitCode = 1;
  });
