import { Router } from 'express';
import type { ShareExtractor } from '../services/extractor';
import { statusForKind } from '../types';
import { batchExtractBodySchema, extractBodySchema, linksBodySchema, parseBody } from './schemas';

export function extractRouter(extractor: ShareExtractor, batchMaxUrls: number): Router {
  const router = Router();
  const batchBodySchema = batchExtractBodySchema(batchMaxUrls);

  // ── POST /extract — Resolve a share into a file tree ─────────────

  router.post('/extract', async (req, res, next) => {
    try {
      const { url, backend, credentials, forceRefresh } = parseBody(extractBodySchema, req.body);
      const result = await extractor.extract(url, backend, { credentials, forceRefresh });

      res.status(result.status === 'success' ? 200 : statusForKind(result.errorKind)).json(result);
    } catch (err) {
      next(err);
    }
  });

  // ── POST /extract/batch — Several shares, one backend ───────────

  router.post('/extract/batch', async (req, res, next) => {
    try {
      const { urls, backend, credentials, forceRefresh } = parseBody(batchBodySchema, req.body);
      const results = await extractor.extractMany(urls, backend, { credentials, forceRefresh });
      const succeeded = results.filter(result => result.status === 'success').length;

      res.json({
        results: results.map((result, index) => ({ url: urls[index], ...result })),
        succeeded,
        failed: results.length - succeeded,
      });
    } catch (err) {
      next(err);
    }
  });

  // ── POST /links — Download links for one file ────────────────────

  router.post('/links', async (req, res, next) => {
    try {
      const { remoteId, auth } = parseBody(linksBodySchema, req.body);
      const result = await extractor.generateLinks(remoteId, auth);

      res.status(result.status === 'success' ? 200 : statusForKind(result.errorKind)).json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
