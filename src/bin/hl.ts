#!/usr/bin/env node

import { defaultCliContext, runCli } from '../cli.js';
import { describeError } from '../errors.js';

async function main(): Promise<number> {
  return runCli(process.argv.slice(2), defaultCliContext());
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(describeError(error));
    process.exitCode = 1;
  }
);
