import pino, { type Logger } from 'pino';

import { env } from '../config/env.js';

export const logger: Logger = pino({
  level: env.LOG_LEVEL,
  base: { service: 'reelshuffle' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
