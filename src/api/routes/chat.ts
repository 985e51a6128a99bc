// ═══════════════════════════════════════════════════════════════════════════════
// CHAT ROUTES — Public Chat Stream
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   POST   /chat            Post a chat message
//   GET    /chat?limit=     Recent chat messages as stored (raw)
//
// Clients poll; there is no push delivery.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { DocumentStore } from '../../storage/index.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { validateBody, validateQuery } from '../middleware/validate.js';
import {
  COLLECTIONS,
  ChatMessageSchema,
  ListChatQuerySchema,
} from '../schemas/index.js';

export function createChatRouter(store: DocumentStore): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const message = validateBody(ChatMessageSchema, req.body);
      const id = await store.createDocument(COLLECTIONS.chatMessage, message);
      res.json({ id });
    })
  );

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const { limit } = validateQuery(ListChatQuerySchema, req.query);
      const docs = await store.getDocuments(COLLECTIONS.chatMessage, {}, limit);
      res.json(docs);
    })
  );

  return router;
}
