#!/usr/bin/env node
import { createCli } from '../cli/index.js';
import { logger } from '../utils/logger.js';

createCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logger.error(err instanceof Error ? err.message : 'Unknown error');
    process.exit(1);
  });
