import { Router } from 'express';
import type { HybridSearchPipeline } from '../../retrieval/pipeline.js';
import { parseFilter } from '../../retrieval/filter.js';
import { parsePreferences } from '../../retrieval/preference-scorer.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { optionalNumber, readBody, requireText } from '../request.js';

/**
 * Raw pipeline search over any indexed items.
 *
 * POST /api/search
 * `{ query, filter?, preferences?, limit?, topK?, similarityThreshold?, timeoutMs? }`
 */
export function createSearchRouter(pipeline: HybridSearchPipeline, defaultLimit: number): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = readBody(req.body);
      const result = await pipeline.search({
        text: requireText(body, 'query'),
        filter: body.filter === undefined ? undefined : parseFilter(body.filter),
        preferences: body.preferences === undefined ? undefined : parsePreferences(body.preferences),
        limit: optionalNumber(body, 'limit', 'INVALID_LIMIT') ?? defaultLimit,
        topK: optionalNumber(body, 'topK', 'INVALID_TOP_K'),
        similarityThreshold: optionalNumber(body, 'similarityThreshold', 'INVALID_THRESHOLD'),
        timeoutMs: optionalNumber(body, 'timeoutMs', 'INVALID_TIMEOUT'),
      });
      res.json(result);
    }),
  );

  return router;
}
