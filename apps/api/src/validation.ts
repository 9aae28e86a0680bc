import { ValidationError } from '@casecontext/core';
import type { z } from 'zod';

/**
 * Parse a request body or querystring, throwing ValidationError with the
 * flattened zod issues as details
 */
export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, result.error.flatten());
  }
  return result.data;
}
