/**
 * Graceful Shutdown Module
 *
 * Stops accepting requests, lets in-flight ones drain, then exits.
 * The item store is volatile, so there is nothing to flush.
 */

import type { FastifyInstance } from 'fastify';
import { logger } from './logger.js';

// Maximum time to wait for graceful shutdown before forcing exit
const SHUTDOWN_TIMEOUT_MS = 10_000;

export interface ShutdownDependencies {
  server: Pick<FastifyInstance, 'close'>;
}

let isShuttingDown = false;

/**
 * Perform graceful shutdown.
 * Exits with code 0 on success, 1 on timeout or error.
 */
export async function gracefulShutdown(deps: ShutdownDependencies): Promise<void> {
  // Prevent multiple shutdown attempts
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress');
    return;
  }
  isShuttingDown = true;

  logger.info('Starting graceful shutdown...');

  const forceExitTimeout = setTimeout(() => {
    logger.error({ timeoutMs: SHUTDOWN_TIMEOUT_MS }, 'Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    logger.info('Closing HTTP server...');
    await deps.server.close();
    logger.info('HTTP server closed');

    clearTimeout(forceExitTimeout);

    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'Error during graceful shutdown');
    clearTimeout(forceExitTimeout);
    process.exit(1);
  }
}

/**
 * Register shutdown handlers for SIGTERM and SIGINT.
 */
export function registerShutdownHandlers(deps: ShutdownDependencies): void {
  const handler = () => {
    gracefulShutdown(deps).catch((err) => {
      logger.error({ err }, 'Fatal error during shutdown');
      process.exit(1);
    });
  };

  process.on('SIGTERM', handler);
  process.on('SIGINT', handler);

  logger.debug('Shutdown handlers registered');
}
