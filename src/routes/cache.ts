import { Router } from 'express';
import type { ResponseCache } from '../services/responseCache';

export function cacheRouter(cache: ResponseCache): Router {
  const router = Router();

  // ── GET / — Entry counts and ages ────────────────────────────────

  router.get('/', (_req, res) => {
    res.json(cache.stats());
  });

  // ── POST /sweep — Drop expired entries ───────────────────────────

  router.post('/sweep', (_req, res) => {
    res.json({ removed: cache.sweepExpired() });
  });

  // ── DELETE / — Drop one entry (?url=) or everything ──────────────

  router.delete('/', (req, res) => {
    const { url } = req.query;

    if (typeof url === 'string' && url !== '') {
      res.json({ removed: cache.remove(url) ? 1 : 0 });
      return;
    }
    res.json({ removed: cache.clear() });
  });

  return router;
}
