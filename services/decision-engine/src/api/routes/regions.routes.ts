/**
 * Region Routes
 *
 * Read-only views of the latest closed region health snapshots.
 */

import { Router, Request, Response } from 'express';
import type { EngineStateProvider } from '../types';

export function createRegionRoutes(state: EngineStateProvider): Router {
  const router = Router();

  /**
   * GET /api/regions
   */
  router.get('/regions', (_req: Request, res: Response) => {
    res.json({ regions: state.listRegionHealth() });
  });

  /**
   * GET /api/regions/:region
   * 404 until the region has closed a cycle.
   */
  router.get('/regions/:region', (req: Request, res: Response) => {
    const health = state.getRegionHealth(req.params.region);
    if (!health) {
      res.status(404).json({ error: `No health recorded for region ${req.params.region}` });
      return;
    }
    res.json(health);
  });

  return router;
}
