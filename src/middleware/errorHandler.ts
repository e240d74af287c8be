import type { Request, Response, NextFunction } from 'express';
import { Logger } from '../helpers/logger';
import { AppError } from '../types/errors';

const log = new Logger('error');

/** Errors raised by express.json() carry their HTTP status. */
function clientErrorStatus(err: Error): number | null {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
}

/**
 * Express error-handling middleware.
 * Renders thrown AppErrors and body-parser failures as JSON; anything else
 * is logged and hidden behind a 500.
 */
export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    res.status(err.statusCode).json({ error: err.message, errorKind: err.kind });
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== null) {
    res.status(status).json({ error: status === 413 ? 'Request body too large' : 'Malformed request body' });
    return;
  }

  log.error('Unhandled error', {
    error: err.message,
    stack: err.stack,
  });

  res.status(500).json({ error: 'Internal server error' });
}
