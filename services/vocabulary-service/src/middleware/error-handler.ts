import { NextFunction, Request, Response } from 'express';
import { errorMessage, InconsistentStateError, InputError } from '../utils/errors';
import { logger } from '../utils/logger';

function isMalformedJson(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

// Global error handler
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof InputError) {
    res.status(error.statusCode).json({ error: error.message });
    return;
  }

  if (isMalformedJson(error)) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }

  if (error instanceof InconsistentStateError) {
    logger.error('Inconsistent stored state', { path: req.path, error: error.message });
    res.status(500).json({ error: 'Inconsistent state', message: error.message });
    return;
  }

  logger.error('Unhandled error', {
    path: req.path,
    method: req.method,
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined
  });
  res.status(500).json({ error: 'Internal server error' });
}
