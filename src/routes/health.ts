import { Router } from 'express';
import type { ResponseCache } from '../services/responseCache';

export function healthRouter(cache: ResponseCache | null): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      memoryMB: Math.round(process.memoryUsage().rss / 1_048_576),
      cache: cache ? 'enabled' : 'disabled',
    });
  });

  return router;
}
