#!/usr/bin/env node
import { safeError } from '../utils/errors.js';
import { runVerifyCommand } from './verify-command.js';

runVerifyCommand(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`[Pipeline] Unexpected failure: ${safeError(error)}`);
    process.exitCode = 1;
  });
