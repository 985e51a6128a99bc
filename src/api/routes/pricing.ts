// ═══════════════════════════════════════════════════════════════════════════════
// PRICING ROUTES — Subscription Plans
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET    /pricing    List plans, or the built-in defaults when none are stored
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { defaultPricingPlans } from '../../services/seed/index.js';
import type { DocumentStore } from '../../storage/index.js';
import { asyncHandler } from '../middleware/error-handler.js';
import {
  COLLECTIONS,
  LIST_DEFAULTS,
  PricingPlanSchema,
  filterDocuments,
} from '../schemas/index.js';

export function createPricingRouter(store: DocumentStore): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      const docs = await store.getDocuments(COLLECTIONS.pricingPlan, {}, LIST_DEFAULTS.pricing);

      if (docs.length === 0) {
        res.json(defaultPricingPlans());
        return;
      }

      res.json(filterDocuments(PricingPlanSchema, docs, COLLECTIONS.pricingPlan));
    })
  );

  return router;
}
