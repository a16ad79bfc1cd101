#!/usr/bin/env node
import { run } from './cli.js';
import { logger } from './utils/index.js';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error('Fatal error:', err);
    process.exit(1);
  });
