/**
 * API Module
 *
 * Builds the Express application for the decision engine: middleware,
 * routes, a JSON 404 and an error handler.
 */

import express from 'express';
import type { ErrorRequestHandler, Express, Request, Response } from 'express';
import { getErrorMessage } from '@regionguard/core';
import { configureMiddleware } from './middleware';
import { setupAllRoutes } from './routes';
import type { RouteOptions } from './routes';
import type { EngineStateProvider, MinimalLogger } from './types';

// Types
export * from './types';

// Middleware
export { configureMiddleware } from './middleware';

// Routes
export {
  setupAllRoutes,
  createHealthRoutes,
  createRegionRoutes,
  createGroupRoutes,
  createAlertRoutes,
  createStreamRoutes,
  createMetricsRoutes,
} from './routes';
export type { RouteOptions, StreamRouteOptions } from './routes';

function hasStatus(error: unknown): error is { status: number; type?: string } {
  return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number';
}

export function createApiApp(state: EngineStateProvider, logger: MinimalLogger, options: RouteOptions = {}): Express {
  const app = express();
  configureMiddleware(app, logger);
  setupAllRoutes(app, state, logger, options);

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
  });

  const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
    // Body parser errors carry a 4xx status
    if (hasStatus(error) && error.status >= 400 && error.status < 500) {
      res.status(error.status).json({ error: getErrorMessage(error) });
      return;
    }
    logger.error('Unhandled API error', { method: req.method, url: req.originalUrl, error: getErrorMessage(error) });
    res.status(500).json({ error: 'Internal server error' });
  };
  app.use(errorHandler);

  return app;
}
