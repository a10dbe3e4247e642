#!/usr/bin/env node
import { logger } from '@/shared/logger/pino.js';

import { runCli } from './run-cli.js';

const controller = new AbortController();

process.once('SIGINT', () => {
  logger.warn('Interrupt received, stopping render');
  controller.abort();
});

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, 'reelshuffle crashed');
    process.exitCode = 1;
  });
