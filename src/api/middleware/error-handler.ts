// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — API Error Classes and Express Error Middleware
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { getLogger } from '../../logging/index.js';
import { StorageUnavailableError } from '../../storage/errors.js';

const logger = getLogger({ component: 'error-handler' });

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Base class for errors that map onto an HTTP response.
 *
 * Operational errors are expected failures whose message is safe to return
 * to the client. Non-operational ones are rendered with a generic message.
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;
  readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 400,
    code: string = 'BAD_REQUEST',
    details?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
  }
}

export class BadRequestError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'BAD_REQUEST', details);
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 422, 'VALIDATION_ERROR', details);
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string, id?: string) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, 404, 'NOT_FOUND');
  }
}

export class InternalError extends ApiError {
  constructor(message: string = 'Internal server error', details?: Record<string, unknown>) {
    super(message, 500, 'INTERNAL_ERROR', details, false);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ZOD HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Convert a ZodError into a ValidationError with per-field messages.
 */
export function fromZodError(error: ZodError, message?: string): ValidationError {
  const flattened = error.flatten();
  return new ValidationError(
    message ?? error.issues.map((i) => i.message).join(', '),
    {
      fields: flattened.fieldErrors,
      ...(flattened.formErrors.length > 0 ? { form: flattened.formErrors } : {}),
    }
  );
}

function isJsonSyntaxError(error: unknown): error is SyntaxError & { body: unknown } {
  return error instanceof SyntaxError && 'body' in error;
}

/**
 * A 4xx `http-errors` error whose message is meant for the client, as raised
 * by the body parser for oversized bodies or unsupported charsets.
 */
interface ExposedClientError extends Error {
  status: number;
  expose: true;
}

function isExposedClientError(error: unknown): error is ExposedClientError {
  if (!(error instanceof Error) || !('status' in error) || !('expose' in error)) {
    return false;
  }
  const { status, expose } = error;
  return typeof status === 'number' && status >= 400 && status < 500 && expose === true;
}

const CLIENT_ERROR_CODES: Record<number, string> = {
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE',
};

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Wrap an async route handler so that rejections reach the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Terminal 404 handler for unmatched routes.
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Route', `${req.method} ${req.path}`));
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  let apiError: ApiError;

  if (err instanceof ApiError) {
    apiError = err;
  } else if (err instanceof StorageUnavailableError) {
    apiError = new ApiError(err.message, 500, 'STORAGE_UNAVAILABLE');
  } else if (err instanceof ZodError) {
    apiError = fromZodError(err);
  } else if (isJsonSyntaxError(err)) {
    apiError = new ApiError('Invalid JSON in request body', 400, 'INVALID_JSON');
  } else if (isExposedClientError(err)) {
    apiError = new ApiError(err.message, err.status, CLIENT_ERROR_CODES[err.status] ?? 'BAD_REQUEST');
  } else {
    apiError = new InternalError();
  }

  const requestId = res.getHeader?.('X-Request-Id');
  const logContext = {
    method: req.method,
    path: req.path,
    statusCode: apiError.statusCode,
    code: apiError.code,
    requestId: typeof requestId === 'string' ? requestId : undefined,
  };

  if (apiError.statusCode >= 500) {
    logger.error('Request failed', err instanceof Error ? err : undefined, logContext);
  } else {
    logger.warn(apiError.message, logContext);
  }

  const body: { error: string; code: string; details?: Record<string, unknown> } = {
    error: apiError.isOperational ? apiError.message : 'Internal server error',
    code: apiError.code,
  };
  if (apiError.details && apiError.isOperational) {
    body.details = apiError.details;
  }

  res.status(apiError.statusCode).json(body);
}
