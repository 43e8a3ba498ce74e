// ============================================================================
// Validation Helpers
// ============================================================================
// Input parsing for tool arguments. Every failure is an `Invalid` error,
// raised before any request leaves the process.
// ============================================================================

import { z } from 'zod';
import { invalid } from '../../api/errors.js';

/** Positive integer record identifier. */
export function identifierArg(field: string) {
  return z.number({
    required_error: `Missing required field: ${field}`,
    invalid_type_error: `${field} must be a positive integer`,
  })
    .int(`${field} must be a positive integer`)
    .positive(`${field} must be a positive integer`)
    .safe(`${field} must be a positive integer`);
}

/** Optional argument; hosts sometimes send null for omitted values. */
export function optionalArg<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

export const limitArg = optionalArg(
  z.number({ invalid_type_error: 'limit must be an integer' }).int('limit must be an integer')
);

export const cursorArg = optionalArg(
  z.string({ invalid_type_error: 'cursor must be a string' }).min(1, 'cursor must not be empty')
);

/**
 * Parse raw tool arguments against a schema, throwing `Invalid` with the
 * first problem found.
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const result = schema.safeParse(args ?? {});
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  if (!issue) {
    throw invalid('Invalid arguments');
  }
  const field = issue.path.join('.');
  // Messages from identifierArg and friends already name the field.
  const message = field && !issue.message.includes(field) ? `${field}: ${issue.message}` : issue.message;
  throw invalid(message);
}

/**
 * Parse a record id that arrived as text, e.g. from a resource URI.
 */
export function parseIdSegment(segment: string, field: string): number {
  const value = Number(segment);
  if (!/^-?\d+$/.test(segment) || !Number.isSafeInteger(value)) {
    throw invalid(`${field} must be a positive integer`);
  }
  return value;
}
