import { z } from 'zod';
import { ValidationError } from '@tabflow/utils';

/**
 * Validate commander options against a command's schema
 *
 * @throws ValidationError listing every issue
 */
export function parseArguments<T extends z.ZodTypeAny>(schema: T, rawArgs: Record<string, unknown>): z.infer<T> {
  const result = schema.safeParse(rawArgs);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}
