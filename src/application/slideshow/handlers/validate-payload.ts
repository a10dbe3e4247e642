import type { Logger } from 'pino';
import type { z } from 'zod';

import { AppError } from '@/shared/errors/app-error.js';

export function parsePayload<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  payload: unknown,
  code: string,
  logger: Logger,
): z.output<TSchema> {
  const parsed = schema.safeParse(payload);

  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues }, 'Invalid payload received');
    throw AppError.validation(code, { issues: parsed.error.issues });
  }

  return parsed.data;
}
