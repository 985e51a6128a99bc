// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES INDEX — API Route Registration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every router factory takes the process-wide DocumentStore; nothing reaches
// storage through a global.
//
// Usage:
//   import { createApiRouter } from './api/routes/index.js';
//   app.use(createApiRouter(store));
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router } from 'express';
import { getLogger } from '../../logging/index.js';
import type { DocumentStore } from '../../storage/index.js';

import { createHealthRouter } from './health.js';
import { createSeedRouter } from './seed.js';
import { createQuestionRouter } from './questions.js';
import { createAnswerRouter } from './answers.js';
import { createModeRouter } from './modes.js';
import { createPricingRouter } from './pricing.js';
import { createBlogRouter } from './blog.js';
import { createContactRouter } from './contact.js';
import { createChatRouter } from './chat.js';

// ─────────────────────────────────────────────────────────────────────────────────
// RE-EXPORTS
// ─────────────────────────────────────────────────────────────────────────────────

export { createHealthRouter, collectDiagnostics, LIVENESS_MESSAGE, type DiagnosticsReport } from './health.js';
export { createSeedRouter } from './seed.js';
export { createQuestionRouter } from './questions.js';
export { createAnswerRouter } from './answers.js';
export { createModeRouter } from './modes.js';
export { createPricingRouter } from './pricing.js';
export { createBlogRouter } from './blog.js';
export { createContactRouter } from './contact.js';
export { createChatRouter } from './chat.js';

const logger = getLogger({ component: 'api-routes' });

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED ROUTER FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

const RESOURCE_ROUTERS: ReadonlyArray<[string, (store: DocumentStore) => Router]> = [
  ['/seed', createSeedRouter],
  ['/questions', createQuestionRouter],
  ['/answers', createAnswerRouter],
  ['/modes', createModeRouter],
  ['/pricing', createPricingRouter],
  ['/blog', createBlogRouter],
  ['/contact', createContactRouter],
  ['/chat', createChatRouter],
];

/**
 * Health routes (`/`, `/test`) plus one router per resource collection.
 */
export function createApiRouter(store: DocumentStore): Router {
  const router = Router();

  router.use(createHealthRouter(store));
  for (const [path, createRouter] of RESOURCE_ROUTERS) {
    router.use(path, createRouter(store));
  }

  logger.debug('Created API router', { resources: RESOURCE_ROUTERS.map(([path]) => path) });

  return router;
}

export default createApiRouter;
