// ═══════════════════════════════════════════════════════════════════════════════
// OPENAPI SCHEMAS — Reusable Component Schemas
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * The subset of the OpenAPI 3.0 Schema Object these docs use.
 */
export interface SchemaObject {
  type?: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  format?: string;
  description?: string;
  default?: unknown;
  example?: unknown;
  enum?: unknown[];
  minimum?: number;
  items?: SchemaObject;
  maxItems?: number;
  properties?: Record<string, SchemaObject>;
  required?: string[];
  additionalProperties?: boolean;
  nullable?: boolean;
  readOnly?: boolean;
  $ref?: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

export const ErrorSchema: SchemaObject = {
  type: 'object',
  properties: {
    error: { type: 'string', description: 'Error message' },
    code: { type: 'string', description: 'Error code' },
    details: { type: 'object', description: 'Additional error details' },
  },
  required: ['error', 'code'],
};

export const CreatedSchema: SchemaObject = {
  type: 'object',
  properties: {
    id: { type: 'string', description: 'Identifier of the stored document' },
  },
  required: ['id'],
};

export const TimestampSchema: SchemaObject = {
  type: 'string',
  format: 'date-time',
  description: 'ISO 8601 timestamp',
  example: '2025-03-01T09:00:00Z',
};

/**
 * A document as stored, returned by the raw read endpoints.
 */
export const StoredDocumentSchema: SchemaObject = {
  type: 'object',
  properties: {
    _id: { type: 'string', readOnly: true },
    created_at: { $ref: '#/components/schemas/Timestamp' },
    updated_at: { $ref: '#/components/schemas/Timestamp' },
  },
  additionalProperties: true,
};

// ─────────────────────────────────────────────────────────────────────────────────
// GAME SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

export const ModeSchema: SchemaObject = {
  type: 'object',
  properties: {
    key: { type: 'string', description: 'Unique key for the mode: child, arts, creative, technology' },
    title: { type: 'string', description: 'Display title for the mode' },
    description: { type: 'string', description: 'Short description of the mode' },
    color: { type: 'string', description: 'Primary color for the mode UI', example: '#FDBA74' },
  },
  required: ['key', 'title', 'description', 'color'],
};

export const QuestionSchema: SchemaObject = {
  type: 'object',
  properties: {
    mode: {
      type: 'string',
      enum: ['child', 'arts', 'creative', 'technology'],
      description: 'Mode key this question belongs to',
    },
    text: { type: 'string', description: 'The creative prompt/question text' },
    tags: { type: 'array', items: { type: 'string' }, nullable: true, default: null },
    locale: { type: 'string', default: 'en-KE' },
  },
  required: ['mode', 'text'],
};

export const AnswerSchema: SchemaObject = {
  type: 'object',
  properties: {
    mode: { type: 'string', description: 'Mode key' },
    question_text: { type: 'string', description: 'The question being answered' },
    answer_text: { type: 'string', description: "User's answer/idea" },
    username: { type: 'string', nullable: true, default: null, description: 'Optional player name' },
    points_awarded: { type: 'integer', default: 0, description: 'Points awarded for the idea' },
  },
  required: ['mode', 'question_text', 'answer_text'],
};

// ─────────────────────────────────────────────────────────────────────────────────
// CONTENT SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

export const BlogPostSchema: SchemaObject = {
  type: 'object',
  properties: {
    title: { type: 'string' },
    slug: { type: 'string' },
    excerpt: { type: 'string' },
    content: { type: 'string' },
    image: { type: 'string', nullable: true, default: null },
    author: { type: 'string', default: 'IMAGINE Team' },
    published_at: {
      type: 'string',
      format: 'date-time',
      description: 'Defaults to the time the post is created',
    },
  },
  required: ['title', 'slug', 'excerpt', 'content'],
};

export const ContactMessageSchema: SchemaObject = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    email: { type: 'string' },
    subject: { type: 'string' },
    message: { type: 'string' },
  },
  required: ['name', 'email', 'subject', 'message'],
};

export const PricingPlanSchema: SchemaObject = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    price_month: { type: 'number' },
    price_year: { type: 'number' },
    features: { type: 'array', items: { type: 'string' } },
  },
  required: ['name', 'price_month', 'price_year', 'features'],
};

export const ChatMessageSchema: SchemaObject = {
  type: 'object',
  properties: {
    username: { type: 'string' },
    text: { type: 'string' },
    mode: { type: 'string', nullable: true, default: null },
  },
  required: ['username', 'text'],
};

// ─────────────────────────────────────────────────────────────────────────────────
// DIAGNOSTICS
// ─────────────────────────────────────────────────────────────────────────────────

export const DiagnosticsSchema: SchemaObject = {
  type: 'object',
  properties: {
    backend: { type: 'string', example: '✅ Running' },
    database: { type: 'string', example: '✅ Connected & Working' },
    database_url: { type: 'string', enum: ['✅ Set', '❌ Not Set'] },
    database_name: { type: 'string', enum: ['✅ Set', '❌ Not Set'] },
    connection_status: { type: 'string', enum: ['Connected', 'Not Connected'] },
    collections: { type: 'array', items: { type: 'string' }, maxItems: 10 },
  },
  required: ['backend', 'database', 'database_url', 'database_name', 'connection_status', 'collections'],
};

// ─────────────────────────────────────────────────────────────────────────────────
// ALL SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

export const schemas: Record<string, SchemaObject> = {
  Error: ErrorSchema,
  Created: CreatedSchema,
  Timestamp: TimestampSchema,
  StoredDocument: StoredDocumentSchema,
  Mode: ModeSchema,
  Question: QuestionSchema,
  Answer: AnswerSchema,
  BlogPost: BlogPostSchema,
  ContactMessage: ContactMessageSchema,
  PricingPlan: PricingPlanSchema,
  ChatMessage: ChatMessageSchema,
  Diagnostics: DiagnosticsSchema,
};
