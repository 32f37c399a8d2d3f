/**
 * Health Check Routes
 *
 * Public endpoints for load balancer health checks and engine status.
 * No authentication required - must be accessible for orchestration.
 */

import { Router, Request, Response } from 'express';
import type { EngineStateProvider } from '../types';

/**
 * Create health check router.
 *
 * @param state - Engine state provider
 * @returns Express router with health endpoints
 */
export function createHealthRoutes(state: EngineStateProvider): Router {
  const router = Router();

  /**
   * GET /api/health
   * Engine summary. 'degraded' while any group is off stable or a decision
   * is only partially applied.
   */
  router.get('/health', (_req: Request, res: Response) => {
    const status = state.getStatus();
    const unsettled = status.groups.filter(group => group.state !== 'stable');
    const healthy = unsettled.length === 0 && status.standingAlerts.length === 0;

    res.json({
      status: healthy ? 'healthy' : 'degraded',
      running: status.running,
      cyclesCompleted: status.cyclesCompleted,
      lastCycleAt: status.lastCycleAt ?? null,
      groups: Object.fromEntries(status.groups.map(group => [group.trafficGroup, group.state])),
      standingAlerts: status.standingAlerts.length,
      timestamp: Date.now(),
    });
  });

  /**
   * GET /api/health/live
   * Liveness probe - returns 200 if the process is running.
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.json({ status: 'alive', timestamp: Date.now() });
  });

  /**
   * GET /api/health/ready
   * Readiness probe - 200 once the engine is polling and has closed a cycle.
   */
  router.get('/health/ready', (_req: Request, res: Response) => {
    const status = state.getStatus();
    const isReady = status.running && status.lastCycleAt !== undefined;

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not_ready',
      running: status.running,
      lastCycleAt: status.lastCycleAt ?? null,
      timestamp: Date.now(),
    });
  });

  return router;
}
