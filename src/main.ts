#!/usr/bin/env node
import { runCli } from './cli';
import { logger } from './utils/logger';

runCli(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Unexpected failure', error);
    process.exitCode = 1;
  });
