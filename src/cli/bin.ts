#!/usr/bin/env node
import { logger } from '../lib/logger.js';

import { runCli } from './index.js';

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    logger.error(error, 'Fatal error');
    process.exitCode = 2;
  });
