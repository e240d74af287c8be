import express, { type Express } from 'express';
import type { AppConfig } from './config';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { registerRoutes } from './routes';
import type { ShareExtractor } from './services/extractor';
import type { ResponseCache } from './services/responseCache';
import { NotFoundError } from './types';

export interface AppDependencies {
  config: AppConfig;
  extractor: ShareExtractor;
  cache: ResponseCache | null;
}

export function createApp({ config, extractor, cache }: AppDependencies): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: config.requestBodyMaxBytes }));
  app.use(requestLogger);

  registerRoutes(app, config, extractor, cache);

  app.use((_req, _res, next) => next(new NotFoundError('Route not found')));
  app.use(errorHandler);

  return app;
}
