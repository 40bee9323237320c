/**
 * Graceful Shutdown
 *
 * On SIGINT or SIGTERM: stop accepting connections, wait for in-flight
 * requests up to the configured timeout, then exit.
 */

import type { Server } from 'node:http';
import { logger, getErrorCode, SHUTDOWN_TIMEOUT_MS } from '@davgate/shared';

export interface ShutdownTarget {
  close(): Promise<void>;
}

export interface GracefulShutdownConfig {
  /**
   * Maximum time to wait for open connections to finish (in milliseconds)
   * Default: SHUTDOWN_TIMEOUT_MS (5000)
   */
  shutdownTimeoutMs?: number;

  /**
   * Exit the process once shutdown completes
   * Default: true
   */
  exitProcess?: boolean;
}

/**
 * Close an HTTP server. A server that is already closed counts as closed.
 */
export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err && getErrorCode(err) !== 'ERR_SERVER_NOT_RUNNING') {
        reject(err);
        return;
      }
      resolve();
    });
  });
}

/**
 * Resolves true if the promise settles first, false if the timeout does.
 */
async function settlesWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });

  try {
    return await Promise.race([promise.then(() => true), timedOut]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Close the target and wait for it, up to the timeout.
 *
 * @returns true if the target closed before the timeout
 */
export async function gracefulShutdown(
  target: ShutdownTarget,
  reason: string,
  config: GracefulShutdownConfig = {}
): Promise<boolean> {
  const { shutdownTimeoutMs = SHUTDOWN_TIMEOUT_MS, exitProcess = true } = config;
  const startedAt = Date.now();

  logger.info('Shutting down server...', {
    component: 'GracefulShutdown',
    reason,
    timeoutMs: shutdownTimeoutMs,
  });

  try {
    const closed = await settlesWithin(target.close(), shutdownTimeoutMs);

    if (!closed) {
      logger.warn('Shutdown timeout reached with open connections', {
        component: 'GracefulShutdown',
        timeoutMs: shutdownTimeoutMs,
      });
    }

    logger.info('Server exited', {
      component: 'GracefulShutdown',
      durationMs: Date.now() - startedAt,
      closed,
    });

    if (exitProcess) {
      process.exit(0);
    }
    return closed;
  } catch (error) {
    logger.error('Server forced to shutdown', error, {
      component: 'GracefulShutdown',
      reason,
    });

    if (exitProcess) {
      process.exit(1);
    }
    return false;
  }
}

/**
 * Shut down on SIGINT or SIGTERM. Later signals during shutdown are ignored.
 *
 * @returns a function that removes the handlers
 */
export function registerShutdownHandlers(target: ShutdownTarget, config: GracefulShutdownConfig = {}): () => void {
  let shutdownReason: string | null = null;

  const onSignal = (signal: NodeJS.Signals): void => {
    if (shutdownReason) {
      logger.warn('Shutdown already in progress', {
        component: 'GracefulShutdown',
        existingReason: shutdownReason,
        newReason: signal,
      });
      return;
    }
    shutdownReason = signal;

    logger.info(`${signal} received`, { component: 'GracefulShutdown' });
    gracefulShutdown(target, signal, config).catch((error: unknown) => {
      logger.error('Shutdown failed', error, { component: 'GracefulShutdown' });
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  logger.debug('Shutdown handlers registered', { component: 'GracefulShutdown' });

  return () => {
    process.off('SIGTERM', onSignal);
    process.off('SIGINT', onSignal);
  };
}
