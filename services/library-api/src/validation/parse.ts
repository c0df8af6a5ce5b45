import { z } from 'zod';
import type { FieldIssue } from '@library/shared';
import { ValidationError } from '../errors';

/**
 * Parse `input` with a zod schema, turning zod issues into a ValidationError
 * that names each offending field.
 */
export function parseWith<Schema extends z.ZodTypeAny>(
  schema: Schema,
  input: unknown,
  fallbackField = 'body'
): z.output<Schema> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toFieldIssues(result.error, fallbackField));
  }
  return result.data;
}

export function toFieldIssues(error: z.ZodError, fallbackField: string): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : fallbackField,
    message: issue.message,
  }));
}

/**
 * A string whose length, counted in characters (code points) rather than
 * UTF-16 units, lies within `min`..`max`.
 */
export function text(min: number, max: number) {
  return z.string().superRefine((value, ctx) => {
    const length = [...value].length;
    if (length < min || length > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          min === max
            ? `must contain exactly ${min} character(s)`
            : `must contain between ${min} and ${max} character(s)`,
      });
    }
  });
}

/**
 * Drop keys whose value is undefined, so that "not supplied" never
 * overwrites a stored field.
 */
export function omitUndefined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}
