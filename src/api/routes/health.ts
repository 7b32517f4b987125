import { Router } from 'express';
import { VERSION } from '../../utils/version.js';

/**
 * GET /api/health
 */
export function createHealthRouter(): Router {
  const router = Router();
  router.get('/', (_req, res) => {
    res.json({ status: 'ok', version: VERSION });
  });
  return router;
}
