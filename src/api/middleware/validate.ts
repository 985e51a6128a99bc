// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST VALIDATION — zod Parsing for Bodies and Query Strings
// ═══════════════════════════════════════════════════════════════════════════════

import type { z } from 'zod';
import { fromZodError } from './error-handler.js';

/**
 * Parse a JSON request body, throwing ValidationError (422) on failure.
 */
export function validateBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw fromZodError(result.error);
  }
  return result.data;
}

/**
 * Parse query-string parameters, throwing ValidationError (422) on failure.
 */
export function validateQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.output<T> {
  const result = schema.safeParse(query);
  if (!result.success) {
    throw fromZodError(result.error, 'Invalid query parameters');
  }
  return result.data;
}
