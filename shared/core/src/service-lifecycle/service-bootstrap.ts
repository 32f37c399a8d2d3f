/**
 * Service Bootstrap Utilities
 *
 * Signal registration, forced-exit protection and entry point wrapping for
 * long-running services.
 */

import type { Server } from 'http';
import type { ILogger } from '../logging';
import { getErrorMessage } from '../resilience/error-handling';
import { clearTimeoutSafe } from '../lifecycle-utils';

// =============================================================================
// Types
// =============================================================================

export interface ServiceShutdownConfig {
  logger: ILogger;

  /** Async callback to run during shutdown (stop loops, close connections) */
  onShutdown: () => Promise<void>;

  serviceName: string;

  /** Max time (ms) to wait for graceful shutdown before force-exiting (default: 10000) */
  shutdownTimeoutMs?: number;

  /** Injected for tests (default: process.exit) */
  exit?: (code: number) => void;
}

/**
 * Removes every handler registered by setupServiceShutdown.
 */
export type ServiceShutdownCleanup = () => void;

export interface RunServiceMainConfig {
  main: () => Promise<void>;
  serviceName: string;
  logger: ILogger;
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

/**
 * Sets up graceful shutdown handling for a service.
 *
 * Provides:
 * - a guard against duplicate shutdown attempts
 * - SIGTERM and SIGINT handlers
 * - an uncaughtException handler that triggers shutdown
 * - an unhandledRejection handler for error visibility
 */
export function setupServiceShutdown(config: ServiceShutdownConfig): ServiceShutdownCleanup {
  const { logger, onShutdown, serviceName, shutdownTimeoutMs = 10000 } = config;
  const exit = config.exit ?? ((code: number) => process.exit(code));

  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.debug(`Already shutting down ${serviceName}, ignoring ${signal}`);
      return;
    }
    isShuttingDown = true;

    logger.info(`Received ${signal}, shutting down ${serviceName} gracefully`);

    let forceExitTimer: NodeJS.Timeout | null = setTimeout(() => {
      logger.error(`${serviceName} shutdown timed out after ${shutdownTimeoutMs}ms, forcing exit`);
      exit(1);
    }, shutdownTimeoutMs);
    forceExitTimer.unref();

    try {
      await onShutdown();
      forceExitTimer = clearTimeoutSafe(forceExitTimer);
      exit(0);
    } catch (error) {
      forceExitTimer = clearTimeoutSafe(forceExitTimer);
      logger.error(`Error during ${serviceName} shutdown`, {
        error: getErrorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      exit(1);
    }
  };

  const sigtermHandler = () => void shutdown('SIGTERM');
  const sigintHandler = () => void shutdown('SIGINT');
  const uncaughtHandler = (error: Error) => {
    logger.error(`Uncaught exception in ${serviceName}`, {
      error: error.message,
      stack: error.stack,
    });
    void shutdown('uncaughtException');
  };
  const rejectionHandler = (reason: unknown) => {
    logger.error(`Unhandled rejection in ${serviceName}`, { reason: getErrorMessage(reason) });
  };

  process.on('SIGTERM', sigtermHandler);
  process.on('SIGINT', sigintHandler);
  process.on('uncaughtException', uncaughtHandler);
  process.on('unhandledRejection', rejectionHandler);

  return () => {
    process.off('SIGTERM', sigtermHandler);
    process.off('SIGINT', sigintHandler);
    process.off('uncaughtException', uncaughtHandler);
    process.off('unhandledRejection', rejectionHandler);
  };
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Run a service's main function, exiting with status 1 on an unhandled error.
 * Skips auto-start under Jest so entry modules can be imported by tests.
 */
export function runServiceMain(config: RunServiceMainConfig): void {
  const { main, serviceName, logger } = config;

  if (process.env.JEST_WORKER_ID) {
    return;
  }

  main().catch((error: unknown) => {
    logger.fatal(`Unhandled error in ${serviceName}`, { error: getErrorMessage(error) });
    process.exit(1);
  });
}

/**
 * Close an HTTP server, resolving after `timeoutMs` even if connections linger.
 */
export async function closeServer(server: Server | null, timeoutMs = 5000): Promise<void> {
  if (!server) {
    return;
  }

  await new Promise<void>(resolve => {
    let resolved = false;
    const safeResolve = () => {
      if (!resolved) {
        resolved = true;
        resolve();
      }
    };
    const timer = setTimeout(safeResolve, timeoutMs);
    timer.unref();
    server.close(() => {
      clearTimeout(timer);
      safeResolve();
    });
  });
}
