/**
 * Alert Routes
 *
 * Standing alerts for partially applied decisions, the recent alert feed and
 * acknowledgement.
 */

import { Router, Request, Response } from 'express';
import type { EngineStateProvider, MinimalLogger } from '../types';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;

function parseLimit(value: unknown): number {
  if (typeof value !== 'string') return DEFAULT_LIMIT;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1) return DEFAULT_LIMIT;
  return Math.min(parsed, MAX_LIMIT);
}

export function createAlertRoutes(state: EngineStateProvider, logger: MinimalLogger): Router {
  const router = Router();

  /**
   * GET /api/alerts?limit=50
   */
  router.get('/alerts', (req: Request, res: Response) => {
    res.json({
      standing: state.getStandingAlerts(),
      recent: state.getAlertHistory(parseLimit(req.query.limit)),
    });
  });

  /**
   * POST /api/alerts/:key/ack
   * The decision stays scheduled for retry; only the alert is cleared.
   */
  router.post('/alerts/:key/ack', (req: Request, res: Response) => {
    const decisionKey = req.params.key;
    if (!state.acknowledgeAlert(decisionKey)) {
      res.status(404).json({ error: `No standing alert for decision ${decisionKey}` });
      return;
    }
    logger.info('Standing alert acknowledged via API', { decisionKey });
    res.json({ acknowledged: true, decisionKey });
  });

  return router;
}
