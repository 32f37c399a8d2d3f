/**
 * Decision Engine Service Entry Point
 *
 * Loads the engine configuration, starts the polling cycle and serves the
 * HTTP API. The library surface lives in ./index.
 *
 * Environment Variables:
 * - ENGINE_CONFIG_PATH: Topology file (default: config/engine.json)
 * - LOG_LEVEL: Minimum log level (default: info)
 * - ALLOWED_ORIGINS: CORS allow-list, required in production
 * - Threshold overrides, see @regionguard/config
 */

import type { Server } from 'http';
import { ConfigurationError } from '@regionguard/types';
import { closeServer, createLogger, runServiceMain, setupServiceShutdown } from '@regionguard/core';
import { loadEngineConfig } from '@regionguard/config';
import type { EngineConfig } from '@regionguard/config';
import { createApiApp } from './api';
import { createEngineRuntime } from './wiring';

const SERVICE_NAME = 'decision-engine';
const logger = createLogger(SERVICE_NAME);

async function main(): Promise<void> {
  let config: EngineConfig;
  try {
    config = loadEngineConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal('Invalid engine configuration', { problems: error.problems, error: error.message });
      process.exit(1);
    }
    throw error;
  }

  const runtime = createEngineRuntime(config, { logger });

  let server: Server | null = null;
  if (config.api.enabled) {
    const app = createApiApp(runtime.engine, logger.child({ component: 'api' }), { metrics: runtime.metrics });
    server = app.listen(config.api.port, () => {
      logger.info('API listening', { port: config.api.port });
    });
  }

  setupServiceShutdown({
    logger,
    serviceName: SERVICE_NAME,
    onShutdown: async () => {
      await runtime.engine.stop();
      await closeServer(server);
      await runtime.close();
    },
  });

  runtime.engine.start();
}

runServiceMain({ main, serviceName: SERVICE_NAME, logger });
