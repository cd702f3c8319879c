import { z } from 'zod';
import { InvalidArgumentsError } from '../errors.js';

/**
 * Validates tool arguments against a zod schema.
 * Throws InvalidArgumentsError listing every failing field.
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.infer<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`,
    );
    throw new InvalidArgumentsError(`Invalid arguments: ${problems.join('; ')}`);
  }
  return result.data;
}

export const limitSchema = (max: number) => z.number().int().min(1).max(max).optional();

export const idSchema = z.number().int().positive();
