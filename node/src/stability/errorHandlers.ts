// Global error handlers and graceful shutdown

import type { Server } from 'http';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { componentLogger } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';

const log = componentLogger('process');

type ShutdownHook = () => void | Promise<void>;

let serverInstance: Server | null = null;
const shutdownHooks: ShutdownHook[] = [];
let shuttingDown = false;

/**
 * Set server instance for graceful shutdown
 */
export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Cleanup run after the server stops accepting requests, in registration order. */
export function onShutdown(hook: ShutdownHook): void {
  shutdownHooks.push(hook);
}

export function setupUnhandledRejectionHandler(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    log.error('Unhandled Promise Rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });

    // In production, log and continue; elsewhere exit for faster debugging
    if (nodeEnv !== 'production') {
      gracefulShutdown('unhandledRejection', 1).catch((err: unknown) => {
        log.fatal('shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      });
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    log.fatal('Uncaught Exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException', 1).catch(() => process.exit(1));
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      log.info(`Received ${signal}, starting graceful shutdown...`);
      gracefulShutdown(signal, 0).catch(() => process.exit(1));
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close((err) => {
      if (err) log.warn('HTTP server close', { error: err.message });
      else log.info('HTTP server closed');
      resolve();
    });
  });
}

export async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(`Graceful shutdown initiated: ${reason}`);

  // Give ongoing requests time to complete (15 seconds)
  const shutdownTimeout = setTimeout(() => {
    log.error('Forced shutdown after timeout');
    process.exit(1);
  }, 15000);
  shutdownTimeout.unref();

  try {
    if (serverInstance) await closeServer(serverInstance);
    for (const hook of shutdownHooks) await hook();
    log.info('Cleanup completed');
    clearTimeout(shutdownTimeout);
    process.exit(exitCode);
  } catch (error: unknown) {
    log.error('Error during shutdown', { error: error instanceof Error ? error.message : String(error) });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

/**
 * Request timeout middleware. Routes listed in `overrides` (matched on the path prefix)
 * get their own limit; streaming responses are never cut off once headers are out.
 */
export function requestTimeout(timeoutMs = 15000, overrides: Record<string, number> = {}): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const override = Object.keys(overrides).find((prefix) => req.path.startsWith(prefix));
    const effectiveTimeout = override ? overrides[override] : timeoutMs;

    const timeout = setTimeout(() => {
      if (!res.headersSent) {
        res
          .status(408)
          .json(createErrorResponse(`Request exceeded ${effectiveTimeout}ms timeout`, undefined, 'REQUEST_TIMEOUT'));
      }
    }, effectiveTimeout);

    res.on('finish', () => clearTimeout(timeout));
    res.on('close', () => clearTimeout(timeout));

    next();
  };
}
