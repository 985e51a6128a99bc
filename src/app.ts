// ═══════════════════════════════════════════════════════════════════════════════
// APP — Express Application Assembly
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Express } from 'express';
import cors from 'cors';
import { loadConfig, type AppConfig } from './config/index.js';
import { createApiRouter } from './api/routes/index.js';
import { errorHandler, notFoundHandler } from './api/middleware/error-handler.js';
import { requestContext } from './api/middleware/request-context.js';
import { createDocsRouter } from './docs/routes.js';
import type { DocumentStore } from './storage/index.js';

export interface AppOptions {
  store: DocumentStore;
  config?: AppConfig;
}

/**
 * Build the HTTP application around an already-initialized document store.
 *
 * CORS is open to every origin, method and header, with credentials: the API
 * serves public game content to browser clients on any host.
 */
export function createApp(options: AppOptions): Express {
  const config = options.config ?? loadConfig();
  const app = express();

  app.disable('x-powered-by');

  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: config.server.jsonBodyLimit }));
  app.use(requestContext);

  app.use(createDocsRouter());
  app.use(createApiRouter(options.store));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
