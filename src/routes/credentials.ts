import { Router } from 'express';
import type { ShareExtractor } from '../services/extractor';
import { apiKeyBodySchema, cookieBodySchema, parseBody } from './schemas';

export function credentialsRouter(extractor: ShareExtractor): Router {
  const router = Router();

  // ── POST /validate/api-key — Check a commercial API key ──────────

  router.post('/validate/api-key', async (req, res, next) => {
    try {
      const { apiKey } = parseBody(apiKeyBodySchema, req.body);
      res.json(await extractor.validateApiKey(apiKey));
    } catch (err) {
      next(err);
    }
  });

  // ── POST /validate/cookie — Check a TeraBox session cookie ───────

  router.post('/validate/cookie', async (req, res, next) => {
    try {
      const { cookie } = parseBody(cookieBodySchema, req.body);
      res.json(await extractor.validateCookie(cookie));
    } catch (err) {
      next(err);
    }
  });

  // ── GET /commercial/keys — Pool health ───────────────────────────

  router.get('/commercial/keys', (_req, res) => {
    res.json({ keys: extractor.commercialKeyStatus() });
  });

  return router;
}
