// ═══════════════════════════════════════════════════════════════════════════════
// OPENAPI SPECIFICATION — IMAGINE API Documentation
// ═══════════════════════════════════════════════════════════════════════════════

import { schemas, type SchemaObject } from './schemas.js';

// ─────────────────────────────────────────────────────────────────────────────────
// DOCUMENT SHAPE
// ─────────────────────────────────────────────────────────────────────────────────

interface MediaType {
  schema: SchemaObject;
  example?: unknown;
}

interface ResponseObject {
  description: string;
  content?: Record<string, MediaType>;
}

interface QueryParameter {
  name: string;
  in: 'query';
  description: string;
  schema: SchemaObject;
  example?: unknown;
}

export interface Operation {
  tags: string[];
  summary: string;
  description?: string;
  operationId: string;
  parameters?: QueryParameter[];
  requestBody?: { required: boolean; content: Record<string, MediaType> };
  responses: Record<string, ResponseObject>;
}

/** Only GET and POST are served. */
export interface PathItem {
  get?: Operation;
  post?: Operation;
}

export interface ApiDocument {
  openapi: string;
  info: { title: string; description: string; version: string };
  servers: Array<{ url: string; description: string }>;
  tags: Array<{ name: string; description: string }>;
  paths: Record<string, PathItem>;
  components: { schemas: Record<string, SchemaObject> };
}

// ─────────────────────────────────────────────────────────────────────────────────
// API VERSION
// ─────────────────────────────────────────────────────────────────────────────────

export const API_VERSION = '1.0.0';
export const OPENAPI_VERSION = '3.0.3';

// ─────────────────────────────────────────────────────────────────────────────────
// BUILDING BLOCKS
// ─────────────────────────────────────────────────────────────────────────────────

function ref(name: string): SchemaObject {
  return { $ref: `#/components/schemas/${name}` };
}

function json(description: string, schema: SchemaObject, example?: unknown): ResponseObject {
  return {
    description,
    content: {
      'application/json': example === undefined ? { schema } : { schema, example },
    },
  };
}

function listOf(name: string): SchemaObject {
  return { type: 'array', items: ref(name) };
}

function body(name: string) {
  return {
    required: true,
    content: { 'application/json': { schema: ref(name) } },
  };
}

function limitParam(defaultValue: number): QueryParameter {
  return {
    name: 'limit',
    in: 'query',
    description: 'Maximum number of documents to return; 0 returns all of them',
    schema: { type: 'integer', minimum: 0, default: defaultValue },
  };
}

const modeParam: QueryParameter = {
  name: 'mode',
  in: 'query',
  description: 'Only return documents with this mode',
  schema: { type: 'string' },
  example: 'arts',
};

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON RESPONSES
// ─────────────────────────────────────────────────────────────────────────────────

const validationError = json('Request body or query failed validation', ref('Error'), {
  error: 'Required',
  code: 'VALIDATION_ERROR',
  details: { fields: { text: ['Required'] } },
});

const storageUnavailable = json('No database is configured', ref('Error'), {
  error: 'Database not configured',
  code: 'STORAGE_UNAVAILABLE',
});

const created = json('Document stored', ref('Created'));

// ─────────────────────────────────────────────────────────────────────────────────
// PATH DEFINITIONS
// ─────────────────────────────────────────────────────────────────────────────────

const paths: Record<string, PathItem> = {
  '/': {
    get: {
      tags: ['Health'],
      summary: 'Liveness message',
      operationId: 'getRoot',
      responses: {
        '200': json('Service is running', {
          type: 'object',
          properties: { message: { type: 'string' } },
        }, { message: 'IMAGINE API running' }),
      },
    },
  },

  '/test': {
    get: {
      tags: ['Health'],
      summary: 'Storage diagnostics',
      description: 'Reports whether a database is configured and reachable. Never fails; problems are reported as status strings.',
      operationId: 'getDiagnostics',
      responses: {
        '200': json('Diagnostics report', ref('Diagnostics')),
      },
    },
  },

  '/seed': {
    post: {
      tags: ['Setup'],
      summary: 'Seed default modes and pricing plans',
      description: 'Inserts the default modes and plans into whichever of the two collections is empty. Safe to call repeatedly.',
      operationId: 'seedContent',
      responses: {
        '200': json('Seeding finished', {
          type: 'object',
          properties: { status: { type: 'string', enum: ['seeded'] } },
        }),
        '500': storageUnavailable,
      },
    },
  },

  '/questions': {
    get: {
      tags: ['Game'],
      summary: 'List questions',
      operationId: 'listQuestions',
      parameters: [modeParam, limitParam(50)],
      responses: {
        '200': json('Questions', listOf('Question')),
        '422': validationError,
      },
    },
    post: {
      tags: ['Game'],
      summary: 'Create a question',
      operationId: 'createQuestion',
      requestBody: body('Question'),
      responses: {
        '200': created,
        '400': json('Mode is not one of the game modes', ref('Error'), {
          error: 'Invalid mode',
          code: 'BAD_REQUEST',
        }),
        '422': validationError,
        '500': storageUnavailable,
      },
    },
  },

  '/answers': {
    get: {
      tags: ['Game'],
      summary: 'List answers',
      description: 'Returns stored documents as they are, including `_id` and timestamps.',
      operationId: 'listAnswers',
      parameters: [modeParam, limitParam(50)],
      responses: {
        '200': json('Answers', listOf('StoredDocument')),
        '422': validationError,
      },
    },
    post: {
      tags: ['Game'],
      summary: 'Submit an answer',
      operationId: 'submitAnswer',
      requestBody: body('Answer'),
      responses: {
        '200': created,
        '422': validationError,
        '500': storageUnavailable,
      },
    },
  },

  '/modes': {
    get: {
      tags: ['Game'],
      summary: 'List game modes',
      description: 'Falls back to the four default modes, without storing them, when none are stored.',
      operationId: 'listModes',
      responses: {
        '200': json('Modes', listOf('Mode')),
      },
    },
  },

  '/pricing': {
    get: {
      tags: ['Content'],
      summary: 'List pricing plans',
      description: 'Falls back to the three default plans, without storing them, when none are stored.',
      operationId: 'listPricingPlans',
      responses: {
        '200': json('Pricing plans', listOf('PricingPlan')),
      },
    },
  },

  '/blog': {
    get: {
      tags: ['Content'],
      summary: 'List blog posts',
      operationId: 'listBlogPosts',
      responses: {
        '200': json('Up to 20 blog posts', listOf('BlogPost')),
      },
    },
    post: {
      tags: ['Content'],
      summary: 'Create a blog post',
      operationId: 'createBlogPost',
      requestBody: body('BlogPost'),
      responses: {
        '200': created,
        '422': validationError,
        '500': storageUnavailable,
      },
    },
  },

  '/contact': {
    post: {
      tags: ['Content'],
      summary: 'Send a contact message',
      operationId: 'sendContactMessage',
      requestBody: body('ContactMessage'),
      responses: {
        '200': json('Message received', {
          type: 'object',
          properties: {
            id: { type: 'string' },
            status: { type: 'string', enum: ['received'] },
          },
        }),
        '422': validationError,
        '500': storageUnavailable,
      },
    },
  },

  '/chat': {
    get: {
      tags: ['Chat'],
      summary: 'List chat messages',
      description: 'Returns stored documents as they are, including `_id` and timestamps.',
      operationId: 'listChatMessages',
      parameters: [limitParam(30)],
      responses: {
        '200': json('Chat messages', listOf('StoredDocument')),
        '422': validationError,
      },
    },
    post: {
      tags: ['Chat'],
      summary: 'Post a chat message',
      operationId: 'sendChatMessage',
      requestBody: body('ChatMessage'),
      responses: {
        '200': created,
        '422': validationError,
        '500': storageUnavailable,
      },
    },
  },
};

// ─────────────────────────────────────────────────────────────────────────────────
// DOCUMENT
// ─────────────────────────────────────────────────────────────────────────────────

export const openAPIDocument: ApiDocument = {
  openapi: OPENAPI_VERSION,
  info: {
    title: 'IMAGINE API',
    description: 'Creative world-building card game for Kenya: prompts, answers, game modes, blog, contact, chat and pricing.',
    version: API_VERSION,
  },
  servers: [
    {
      url: 'http://localhost:8000',
      description: 'Development server',
    },
  ],
  tags: [
    { name: 'Health', description: 'Liveness and storage diagnostics' },
    { name: 'Setup', description: 'Reference data bootstrap' },
    { name: 'Game', description: 'Modes, questions and answers' },
    { name: 'Content', description: 'Blog, contact form and pricing' },
    { name: 'Chat', description: 'Public chat stream' },
  ],
  paths,
  components: {
    schemas,
  },
};
