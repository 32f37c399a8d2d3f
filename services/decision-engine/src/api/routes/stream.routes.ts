/**
 * Live Event Stream
 *
 * GET /api/stream pushes every engine event as a server-sent event named
 * after the event type, with comment heartbeats to keep proxies from closing
 * idle connections.
 */

import { Router, Request, Response } from 'express';
import type { EngineEvent } from '../../types';
import type { EngineStateProvider } from '../types';

export interface StreamRouteOptions {
  /** Heartbeat period (default: 15000) */
  heartbeatMs?: number;
}

function eventPayload(event: EngineEvent): unknown {
  switch (event.type) {
    case 'transition':
      return event.transition;
    case 'decision':
      return event.decision;
    case 'remediation':
      return event.report;
    case 'cycle':
      return event.report;
  }
}

export function createStreamRoutes(state: EngineStateProvider, options: StreamRouteOptions = {}): Router {
  const router = Router();
  const heartbeatMs = options.heartbeatMs ?? 15000;

  router.get('/stream', (req: Request, res: Response) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.write(': connected\n\n');

    const unsubscribe = state.subscribe(event => {
      res.write(`event: ${event.type}\ndata: ${JSON.stringify(eventPayload(event))}\n\n`);
    });

    const heartbeat = setInterval(() => {
      res.write(': heartbeat\n\n');
    }, heartbeatMs);
    heartbeat.unref();

    req.on('close', () => {
      clearInterval(heartbeat);
      unsubscribe();
    });
  });

  return router;
}
