// ═══════════════════════════════════════════════════════════════════════════════
// SEED ROUTES — Reference Data Bootstrap
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { seedReferenceData } from '../../services/seed/index.js';
import type { DocumentStore } from '../../storage/index.js';
import { asyncHandler } from '../middleware/error-handler.js';

export function createSeedRouter(store: DocumentStore): Router {
  const router = Router();

  // POST /seed — 500 STORAGE_UNAVAILABLE when no database is configured
  router.post(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      await seedReferenceData(store);
      res.json({ status: 'seeded' });
    })
  );

  return router;
}
