#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { isS3RestError } from '../errors/index.js';
import { createCli } from './cli.js';

createCli(hideBin(process.argv))
  .parseAsync()
  .catch((error: unknown) => {
    console.error(isS3RestError(error) ? error.toString() : error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
