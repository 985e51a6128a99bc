// ═══════════════════════════════════════════════════════════════════════════════
// CONTENT SCHEMAS — Blog Posts, Contact Messages, Pricing Plans
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { NullableStringSchema, TimestampSchema } from './common.js';

// ─────────────────────────────────────────────────────────────────────────────────
// BLOG
// ─────────────────────────────────────────────────────────────────────────────────

export const DEFAULT_BLOG_AUTHOR = 'IMAGINE Team';

/**
 * Collection: `blogpost`. `published_at` defaults to the moment of validation.
 */
export const BlogPostSchema = z.object({
  title: z.string(),
  slug: z.string(),
  excerpt: z.string(),
  content: z.string(),
  image: NullableStringSchema,
  author: z.string().default(DEFAULT_BLOG_AUTHOR),
  published_at: TimestampSchema.default(() => new Date()),
});

export type BlogPost = z.infer<typeof BlogPostSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONTACT
// ─────────────────────────────────────────────────────────────────────────────────

export const ContactMessageSchema = z.object({
  name: z.string(),
  email: z.string(),
  subject: z.string(),
  message: z.string(),
});

export type ContactMessage = z.infer<typeof ContactMessageSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// PRICING
// ─────────────────────────────────────────────────────────────────────────────────

export const PricingPlanSchema = z.object({
  name: z.string(),
  price_month: z.number(),
  price_year: z.number(),
  features: z.array(z.string()),
});

export type PricingPlan = z.infer<typeof PricingPlanSchema>;
