// ═══════════════════════════════════════════════════════════════════════════════
// BLOG ROUTES
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET    /blog    Latest blog posts (schema-filtered)
//   POST   /blog    Publish a blog post
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { getLogger } from '../../logging/index.js';
import type { DocumentStore } from '../../storage/index.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { validateBody } from '../middleware/validate.js';
import {
  BlogPostSchema,
  COLLECTIONS,
  LIST_DEFAULTS,
  filterDocuments,
} from '../schemas/index.js';

const logger = getLogger({ component: 'blog-routes' });

export function createBlogRouter(store: DocumentStore): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      const docs = await store.getDocuments(COLLECTIONS.blogPost, {}, LIST_DEFAULTS.blog);
      res.json(filterDocuments(BlogPostSchema, docs, COLLECTIONS.blogPost));
    })
  );

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const post = validateBody(BlogPostSchema, req.body);
      const id = await store.createDocument(COLLECTIONS.blogPost, post);

      logger.info('Blog post created', { id, slug: post.slug, requestId: req.requestId });

      res.json({ id });
    })
  );

  return router;
}
