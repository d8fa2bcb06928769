#!/usr/bin/env node

import { main } from '../cli/index';
import { cliLogger as logger } from '@core/utils/logger';

main()
  .then(exitCode => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error('Unexpected CLI failure', { error: error instanceof Error ? error.stack : String(error) });
    console.error(error);
    process.exitCode = 1;
  });
