import type { z } from 'zod';
import { InvalidArgumentError } from './errors';

/**
 * Parses a request payload, turning the first zod issue into an InvalidArgumentError
 * that names the offending field.
 */
export function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
): z.output<S> {
  const parsed = schema.safeParse(body ?? {});
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  const field = issue?.path.length ? issue.path.join('.') : 'body';
  throw new InvalidArgumentError(field, issue?.message ?? 'invalid payload');
}
