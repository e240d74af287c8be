import type { Request, Response, NextFunction } from 'express';
import { Logger } from '../helpers/logger';

const log = new Logger('http');

/**
 * Logs each request with method, path, status code and duration. Health
 * checks log at debug level.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number((process.hrtime.bigint() - start) / 1_000_000n);
    const meta = { status: res.statusCode, durationMs };

    if (req.path === '/health') {
      log.debug(`${req.method} ${req.path}`, meta);
    } else if (res.statusCode >= 500) {
      log.warn(`${req.method} ${req.path}`, meta);
    } else {
      log.info(`${req.method} ${req.path}`, meta);
    }
  });

  next();
}
