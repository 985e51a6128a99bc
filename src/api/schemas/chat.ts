// ═══════════════════════════════════════════════════════════════════════════════
// CHAT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { LIST_DEFAULTS, LimitSchema, NullableStringSchema } from './common.js';

/**
 * Public chat line. `mode` optionally tags the game mode being discussed.
 */
export const ChatMessageSchema = z.object({
  username: z.string(),
  text: z.string(),
  mode: NullableStringSchema,
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

export const ListChatQuerySchema = z.object({
  limit: LimitSchema.default(LIST_DEFAULTS.chat),
});

export type ListChatQuery = z.infer<typeof ListChatQuerySchema>;
