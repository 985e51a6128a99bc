// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST CONTEXT — Request IDs and Access Logging
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logRequest } from '../../logging/index.js';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Tag each request with an id (reusing a well-formed inbound one) and log it
 * once the response has been sent.
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const inbound = req.get(REQUEST_ID_HEADER);
  const requestId = inbound && /^[\w-]{1,64}$/.test(inbound) ? inbound : uuidv4();
  const start = Date.now();

  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on('finish', () => {
    logRequest({
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      duration: Date.now() - start,
      requestId,
      userAgent: req.get('User-Agent'),
      ip: req.ip,
    });
  });

  next();
}
