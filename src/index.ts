#!/usr/bin/env node
import { run } from './cli.js';
import { logger } from './logger.js';

run(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.fatal({ err }, 'fatal');
    process.exit(1);
  });
