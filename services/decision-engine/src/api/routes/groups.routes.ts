/**
 * Traffic Group Routes
 *
 * Group status plus the manual failover command. The command bypasses the
 * automatic thresholds but still runs through the remediation executor.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ErrorCode, ValidationError } from '@regionguard/types';
import { getErrorMessage } from '@regionguard/core';
import type { EngineStateProvider, MinimalLogger } from '../types';

const FailoverRequestSchema = z.object({
  fromRegion: z.string().min(1, 'fromRegion is required'),
  toRegion: z.string().min(1, 'toRegion is required'),
  reason: z.string().trim().min(1, 'reason is required').max(500),
});

export function createGroupRoutes(state: EngineStateProvider, logger: MinimalLogger): Router {
  const router = Router();

  /**
   * GET /api/groups
   */
  router.get('/groups', (_req: Request, res: Response) => {
    res.json({ groups: state.listGroupStatuses() });
  });

  /**
   * GET /api/groups/:id
   */
  router.get('/groups/:id', (req: Request, res: Response) => {
    if (!state.hasGroup(req.params.id)) {
      res.status(404).json({ error: `Unknown traffic group ${req.params.id}` });
      return;
    }
    res.json(state.getGroupStatus(req.params.id));
  });

  /**
   * POST /api/groups/:id/failover
   * Body: { fromRegion, toRegion, reason }
   *
   * 400 invalid body or regions, 404 unknown group, 409 when fromRegion is
   * not the region currently serving the group.
   */
  router.post('/groups/:id/failover', async (req: Request, res: Response) => {
    const groupId = req.params.id;
    if (!state.hasGroup(groupId)) {
      res.status(404).json({ error: `Unknown traffic group ${groupId}` });
      return;
    }

    const parsed = FailoverRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid failover request',
        issues: parsed.error.errors.map(e => `${e.path.join('.') || '(body)'}: ${e.message}`),
      });
      return;
    }

    const { fromRegion, toRegion, reason } = parsed.data;
    try {
      const decision = await state.triggerFailover(groupId, fromRegion, toRegion, reason);
      res.status(202).json({
        decision,
        remediation: state.getRemediationReport(decision.idempotencyKey) ?? null,
      });
    } catch (error) {
      if (error instanceof ValidationError) {
        const status = error.code === ErrorCode.NOT_FOUND ? 404 : error.code === ErrorCode.INVALID_STATE ? 409 : 400;
        res.status(status).json({ error: error.message });
        return;
      }
      logger.error('Manual failover failed', { trafficGroup: groupId, error: getErrorMessage(error) });
      res.status(500).json({ error: 'Failover could not be applied' });
    }
  });

  return router;
}
