// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS INDEX — Entity, Request and Query Validation Schemas
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON
// ─────────────────────────────────────────────────────────────────────────────────

export {
  COLLECTIONS,
  MODE_KEYS,
  isModeKey,
  TimestampSchema,
  NullableStringSchema,
  TagsSchema,
  LIST_DEFAULTS,
  LimitSchema,
  ModeFilterSchema,
  filterDocuments,

  type ModeKey,
} from './common.js';

// ─────────────────────────────────────────────────────────────────────────────────
// GAME
// ─────────────────────────────────────────────────────────────────────────────────

export {
  ModeSchema,
  QuestionSchema,
  CreateQuestionSchema,
  ListQuestionsQuerySchema,
  AnswerSchema,
  ListAnswersQuerySchema,

  type Mode,
  type Question,
  type CreateQuestionRequest,
  type ListQuestionsQuery,
  type Answer,
  type ListAnswersQuery,
} from './game.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CONTENT
// ─────────────────────────────────────────────────────────────────────────────────

export {
  DEFAULT_BLOG_AUTHOR,
  BlogPostSchema,
  ContactMessageSchema,
  PricingPlanSchema,

  type BlogPost,
  type ContactMessage,
  type PricingPlan,
} from './content.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CHAT
// ─────────────────────────────────────────────────────────────────────────────────

export {
  ChatMessageSchema,
  ListChatQuerySchema,

  type ChatMessage,
  type ListChatQuery,
} from './chat.js';
