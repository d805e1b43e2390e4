import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';
import { InvalidArgumentError, UpstreamError, isTravelAssistantError } from '@/utils/errors';
import { correlationIdOf } from './correlation';

/** 400 for caller mistakes, 502 when a model call failed, 500 for everything else. */
function statusFor(err: unknown): number {
  if (err instanceof InvalidArgumentError || err instanceof ZodError) return 400;
  if (err instanceof UpstreamError) return 502;
  return 500;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = statusFor(err);
  const correlationId = correlationIdOf(res);

  if (err instanceof ZodError) {
    const errors = err.issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
    logger.warn('invalid request body', { path: req.path, errors, correlationId });
    res.status(status).json(createErrorResponse('invalid request body', 'invalid_argument', { errors, correlationId }));
    return;
  }

  if (isTravelAssistantError(err)) {
    const details = { path: req.path, code: err.code, error: err.message, correlationId };
    if (status >= 500) logger.error('request failed', details);
    else logger.warn('request failed', details);
    const errors = err instanceof InvalidArgumentError ? err.issues : undefined;
    res.status(status).json(createErrorResponse(err.message, err.code, { errors, correlationId }));
    return;
  }

  logger.error('Unhandled error', {
    path: req.path,
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
    correlationId,
  });
  res.status(500).json(createErrorResponse('Internal Server Error', 'internal_error', { correlationId }));
}

export function notFoundHandler(req: Request, res: Response): void {
  res
    .status(404)
    .json(
      createErrorResponse(`Route not found: ${req.method} ${req.path}`, 'not_found', {
        correlationId: correlationIdOf(res),
      }),
    );
}
