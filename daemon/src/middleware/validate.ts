import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logger';
import { ValidationError } from '../errors';

/** Parses a request body, throwing ValidationError with one line per issue. */
export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown, module: string): T {
  const parsed = schema.safeParse(body);
  if (parsed.success) return parsed.data;

  const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  logger.warn({ module, validation_errors: issues }, 'Validation error');
  throw new ValidationError('Invalid request body', issues);
}
