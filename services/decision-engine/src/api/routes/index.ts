/**
 * Route Registration
 */

import type { Express } from 'express';
import type { EngineStateProvider, MetricsRenderer, MinimalLogger } from '../types';
import { createHealthRoutes } from './health.routes';
import { createRegionRoutes } from './regions.routes';
import { createGroupRoutes } from './groups.routes';
import { createAlertRoutes } from './alerts.routes';
import { createStreamRoutes } from './stream.routes';
import type { StreamRouteOptions } from './stream.routes';
import { createMetricsRoutes } from './metrics.routes';

export interface RouteOptions {
  metrics?: MetricsRenderer;
  stream?: StreamRouteOptions;
}

/**
 * Mount every router: JSON endpoints under /api, metrics at /metrics.
 */
export function setupAllRoutes(
  app: Express,
  state: EngineStateProvider,
  logger: MinimalLogger,
  options: RouteOptions = {}
): void {
  app.use('/api', createHealthRoutes(state));
  app.use('/api', createRegionRoutes(state));
  app.use('/api', createGroupRoutes(state, logger));
  app.use('/api', createAlertRoutes(state, logger));
  app.use('/api', createStreamRoutes(state, options.stream));
  if (options.metrics) {
    app.use(createMetricsRoutes(options.metrics));
  }
}

export {
  createHealthRoutes,
  createRegionRoutes,
  createGroupRoutes,
  createAlertRoutes,
  createStreamRoutes,
  createMetricsRoutes,
};
export type { StreamRouteOptions };
