#!/usr/bin/env node
import { loadLoggingFromEnv } from '@pllcalc/engine';
import { processIO, run } from './cli.js';

loadLoggingFromEnv();

run(process.argv, processIO)
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('pllcalc failed:', err);
    process.exitCode = 1;
  });
