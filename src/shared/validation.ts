/**
 * Loan Tracker - Boundary Validation
 */

import { z } from 'zod';
import { FieldIssue, ValidationError } from './errors';

/** Optional text: null is accepted and treated as absent */
export const optionalText = z.string().nullish();

/**
 * Parse input against a record schema.
 * Throws ValidationError naming every offending field.
 */
export function parseRecord<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);

  if (!result.success) {
    throw new ValidationError(toFieldIssues(result.error));
  }

  return result.data;
}

export function toFieldIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'body',
    message: issue.message,
  }));
}

/**
 * Drop absent optional fields so they are not persisted as nulls.
 */
export function compact(record: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(record).filter(([, value]) => value !== undefined && value !== null)
  );
}
