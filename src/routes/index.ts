import type { Express } from 'express';
import type { AppConfig } from '../config';
import type { ResponseCache } from '../services/responseCache';
import type { ShareExtractor } from '../services/extractor';
import { BACKENDS, NotFoundError } from '../types';
import { cacheRouter } from './cache';
import { credentialsRouter } from './credentials';
import { extractRouter } from './extract';
import { healthRouter } from './health';

/**
 * Mount all route groups onto the Express app.
 */
export function registerRoutes(
  app: Express,
  config: AppConfig,
  extractor: ShareExtractor,
  cache: ResponseCache | null,
): void {
  app.use('/health', healthRouter(cache));
  app.get('/backends', (_req, res) => {
    res.json({ backends: BACKENDS });
  });
  app.use('/', extractRouter(extractor, config.batch.maxUrls));
  app.use('/', credentialsRouter(extractor));

  if (cache) {
    app.use('/cache', cacheRouter(cache));
  } else {
    app.use('/cache', (_req, _res, next) => next(new NotFoundError('Response cache is disabled')));
  }
}
