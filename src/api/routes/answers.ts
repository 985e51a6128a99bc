// ═══════════════════════════════════════════════════════════════════════════════
// ANSWER ROUTES — Player Answers
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   POST   /answers                 Submit an answer
//   GET    /answers?mode=&limit=    List answers as stored (raw)
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { DocumentStore } from '../../storage/index.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { validateBody, validateQuery } from '../middleware/validate.js';
import {
  AnswerSchema,
  COLLECTIONS,
  ListAnswersQuerySchema,
} from '../schemas/index.js';

export function createAnswerRouter(store: DocumentStore): Router {
  const router = Router();

  // ─── SUBMIT ANSWER ───
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const answer = validateBody(AnswerSchema, req.body);
      const id = await store.createDocument(COLLECTIONS.answer, answer);
      res.json({ id });
    })
  );

  // ─── LIST ANSWERS ───
  // Raw read: stored documents are returned with every field they carry.
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const { mode, limit } = validateQuery(ListAnswersQuerySchema, req.query);

      const filter = mode ? { mode } : {};
      const docs = await store.getDocuments(COLLECTIONS.answer, filter, limit);

      res.json(docs);
    })
  );

  return router;
}
