import { z } from 'zod';
import { ValidationError } from '../errors';

export const ALL_BRANCHES = 'all' as const;

export const branchNameSchema = z.string().trim().min(1).max(200);

export const topKSchema = z.number().int().min(1).max(20);

export const horizonMonthsSchema = z.number().int().min(1).max(12);

/** Parses `input` with `schema` and returns the typed output or throws a ValidationError. */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  message = 'Validation failed',
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(message, toFieldErrors(parsed.error));
  }
  return parsed.data;
}

function toFieldErrors(error: z.ZodError): Array<{ field: string; message: string }> {
  return error.issues.map((i) => ({
    field: i.path.join('.'),
    message: i.message,
  }));
}

export function isAllBranches(branch: string): boolean {
  return branch.trim().toLowerCase() === ALL_BRANCHES;
}
