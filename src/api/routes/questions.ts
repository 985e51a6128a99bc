// ═══════════════════════════════════════════════════════════════════════════════
// QUESTION ROUTES — Creative Prompts
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET    /questions?mode=&limit=    List questions (schema-filtered)
//   POST   /questions                 Create a question
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { getLogger } from '../../logging/index.js';
import type { DocumentStore } from '../../storage/index.js';
import { asyncHandler, BadRequestError } from '../middleware/error-handler.js';
import { validateBody, validateQuery } from '../middleware/validate.js';
import {
  COLLECTIONS,
  CreateQuestionSchema,
  ListQuestionsQuerySchema,
  QuestionSchema,
  filterDocuments,
  isModeKey,
} from '../schemas/index.js';

const logger = getLogger({ component: 'question-routes' });

export function createQuestionRouter(store: DocumentStore): Router {
  const router = Router();

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIST QUESTIONS
  // GET /questions
  // ═══════════════════════════════════════════════════════════════════════════════

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const { mode, limit } = validateQuery(ListQuestionsQuerySchema, req.query);

      const filter = mode ? { mode } : {};
      const docs = await store.getDocuments(COLLECTIONS.question, filter, limit);

      res.json(filterDocuments(QuestionSchema, docs, COLLECTIONS.question));
    })
  );

  // ═══════════════════════════════════════════════════════════════════════════════
  // CREATE QUESTION
  // POST /questions
  // ═══════════════════════════════════════════════════════════════════════════════

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const question = validateBody(CreateQuestionSchema, req.body);

      if (!isModeKey(question.mode)) {
        throw new BadRequestError('Invalid mode');
      }

      const id = await store.createDocument(COLLECTIONS.question, question);

      logger.info('Question created', {
        id,
        mode: question.mode,
        requestId: req.requestId,
      });

      res.json({ id });
    })
  );

  return router;
}
