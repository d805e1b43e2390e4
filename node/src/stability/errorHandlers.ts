// Process-level error handlers and graceful shutdown for the HTTP server.
import type { Server } from 'http';
import type { Request, Response, NextFunction } from 'express';
import { correlationIdOf } from '@/middleware/correlation';
import { logger } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';

const SHUTDOWN_TIMEOUT_MS = 15000;

let serverInstance: Server | null = null;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

export function setupUnhandledRejectionHandler(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection', {
      error: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    // Keep serving in production; fail fast while developing.
    if (nodeEnv !== 'production') process.exit(1);
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('Uncaught exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  signals.forEach((signal) => {
    process.on(signal, () => gracefulShutdown(signal, 0));
  });
}

function gracefulShutdown(reason: string, exitCode: number): void {
  logger.info(`Graceful shutdown initiated: ${reason}`);

  const forced = setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forced.unref();

  const server = serverInstance;
  if (!server) {
    process.exit(exitCode);
  }
  server.close((err) => {
    if (err) logger.error('Error while closing HTTP server', { error: err.message });
    else logger.info('HTTP server closed');
    process.exit(err ? 1 : exitCode);
  });
}

/** Answer 408 when a handler has not responded within `timeoutMs`. */
export function requestTimeout(timeoutMs: number = 15000) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const timeout = setTimeout(() => {
      if (!res.headersSent) {
        logger.warn('Request timeout', { path: req.path, timeoutMs });
        res
          .status(408)
          .json(
            createErrorResponse(`Request exceeded ${timeoutMs}ms timeout`, 'request_timeout', {
              correlationId: correlationIdOf(res),
            }),
          );
      }
    }, timeoutMs);

    res.on('finish', () => clearTimeout(timeout));
    res.on('close', () => clearTimeout(timeout));
    next();
  };
}
