// ═══════════════════════════════════════════════════════════════════════════════
// CONTACT ROUTES — Contact Form Submissions
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { getLogger } from '../../logging/index.js';
import type { DocumentStore } from '../../storage/index.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { validateBody } from '../middleware/validate.js';
import { COLLECTIONS, ContactMessageSchema } from '../schemas/index.js';

const logger = getLogger({ component: 'contact-routes' });

export function createContactRouter(store: DocumentStore): Router {
  const router = Router();

  // POST /contact
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const message = validateBody(ContactMessageSchema, req.body);
      const id = await store.createDocument(COLLECTIONS.contactMessage, message);

      // The sender's address is redacted by the logger.
      logger.info('Contact message received', {
        id,
        email: message.email,
        requestId: req.requestId,
      });

      res.json({ id, status: 'received' });
    })
  );

  return router;
}
