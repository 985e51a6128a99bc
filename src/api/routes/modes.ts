// ═══════════════════════════════════════════════════════════════════════════════
// MODE ROUTES — Game Modes
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET    /modes    List modes, or the built-in defaults when none are stored
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { defaultModes } from '../../services/seed/index.js';
import type { DocumentStore } from '../../storage/index.js';
import { asyncHandler } from '../middleware/error-handler.js';
import {
  COLLECTIONS,
  LIST_DEFAULTS,
  ModeSchema,
  filterDocuments,
} from '../schemas/index.js';

export function createModeRouter(store: DocumentStore): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      const docs = await store.getDocuments(COLLECTIONS.mode, {}, LIST_DEFAULTS.modes);

      // Not seeded yet: serve the defaults without writing them.
      if (docs.length === 0) {
        res.json(defaultModes());
        return;
      }

      res.json(filterDocuments(ModeSchema, docs, COLLECTIONS.mode));
    })
  );

  return router;
}
