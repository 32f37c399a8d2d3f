/**
 * Metrics Route
 *
 * GET /metrics in the Prometheus text exposition format.
 */

import { Router, Request, Response } from 'express';
import type { MetricsRenderer } from '../types';

export function createMetricsRoutes(metrics: MetricsRenderer): Router {
  const router = Router();

  router.get('/metrics', (_req: Request, res: Response) => {
    res.set('Content-Type', 'text/plain; version=0.0.4; charset=utf-8').send(metrics.render());
  });

  return router;
}
