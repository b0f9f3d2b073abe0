/**
 * Express middleware shared by every route
 */

import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import { logger } from '../core/logger.js';
import { AppError } from '../errors/index.js';

/**
 * Forwards a rejected handler promise to the error middleware
 */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export const requestLogger: RequestHandler = (req, res, next) => {
  const started = Date.now();
  res.on('finish', () => {
    logger.debug(
      { method: req.method, path: req.originalUrl, status: res.statusCode, durationMs: Date.now() - started },
      'request handled'
    );
  });
  next();
};

export const notFound: RequestHandler = (req, res) => {
  res.status(404).json({ error: { code: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` } });
};

/**
 * Maps AppError subclasses to their status code; anything else is a 500
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof AppError) {
    const status = err.statusCode >= 400 && err.statusCode < 600 ? err.statusCode : 500;
    if (status >= 500) {
      logger.error({ err, path: req.originalUrl }, 'Request failed');
    }
    res.status(status).json({ error: { code: err.code, message: err.message } });
    return;
  }

  // express.json() rejects malformed bodies with a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' } });
    return;
  }

  logger.error({ err, path: req.originalUrl }, 'Unhandled request error');
  res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
};
