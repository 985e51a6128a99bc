// ═══════════════════════════════════════════════════════════════════════════════
// COMMON SCHEMAS — Shared Field, Query and Read-Filter Schemas
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import type { StoredDocument } from '../../storage/index.js';
import { InternalError } from '../middleware/error-handler.js';

// ─────────────────────────────────────────────────────────────────────────────────
// COLLECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Collection name per entity: the lowercased entity name.
 */
export const COLLECTIONS = {
  mode: 'mode',
  question: 'question',
  answer: 'answer',
  blogPost: 'blogpost',
  contactMessage: 'contactmessage',
  chatMessage: 'chatmessage',
  pricingPlan: 'pricingplan',
} as const;

// ─────────────────────────────────────────────────────────────────────────────────
// MODE KEYS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * The fixed set of game modes a question may belong to.
 */
export const MODE_KEYS = ['child', 'arts', 'creative', 'technology'] as const;

export type ModeKey = (typeof MODE_KEYS)[number];

export function isModeKey(value: string): value is ModeKey {
  return MODE_KEYS.some((key) => key === value);
}

// ─────────────────────────────────────────────────────────────────────────────────
// FIELD SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Accepts a Date, an ISO 8601 string or epoch milliseconds; yields a Date.
 */
export const TimestampSchema = z
  .union([z.date(), z.string().min(1), z.number()])
  .transform((value, ctx) => {
    const date = new Date(value);
    if (isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid datetime' });
      return z.NEVER;
    }
    return date;
  });

/**
 * Optional string that defaults to null when omitted.
 */
export const NullableStringSchema = z.string().nullable().default(null);

export const TagsSchema = z.array(z.string()).nullable().default(null);

// ─────────────────────────────────────────────────────────────────────────────────
// QUERY SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

export const LIST_DEFAULTS = {
  questions: 50,
  answers: 50,
  chat: 30,
  modes: 10,
  pricing: 10,
  blog: 20,
} as const;

/**
 * Page size from a query string value. 0 means no limit, as in the driver.
 */
export const LimitSchema = z.coerce
  .number()
  .int('Limit must be an integer')
  .nonnegative('Limit must not be negative');

/**
 * Optional mode filter. An empty value means "no filter".
 */
export const ModeFilterSchema = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA-FILTERED READS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Parse stored documents through their entity schema. Fields the schema does
 * not declare (`_id`, `created_at`, ...) are dropped and declared defaults
 * are filled in.
 */
export function filterDocuments<T extends z.ZodTypeAny>(
  schema: T,
  docs: readonly StoredDocument[],
  collection: string
): Array<z.output<T>> {
  return docs.map((doc) => {
    const result = schema.safeParse(doc);
    if (!result.success) {
      throw new InternalError('Stored document does not match its schema', {
        collection,
        fields: result.error.flatten().fieldErrors,
      });
    }
    return result.data;
  });
}
