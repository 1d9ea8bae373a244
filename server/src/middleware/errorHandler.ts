import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { isHttpError, ValidationError } from '../utils/errors.js';
import { logger } from '../logger.js';

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction) {
  if (isHttpError(error)) {
    if (error.status >= 500) {
      logger.error('request_failed', { method: req.method, path: req.path, error: error.message, details: error.details });
    }
    res.status(error.status).json({
      error: error.message,
      details: error.details ?? undefined,
    });
    return;
  }

  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message });
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({
      error: 'Invalid request',
      details: error.issues,
    });
    return;
  }

  logger.error('unhandled_error', { method: req.method, path: req.path, error });
  res.status(500).json({ error: 'Internal server error' });
}
