import type { Request, Response, NextFunction } from 'express';
import { componentLogger } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';
import { correlationIdOf } from './correlation';

const log = componentLogger('http');

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 600 ? err.status : 500;
  }
  return 500;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = statusOf(err);
  log.error(`${req.method} ${req.originalUrl} failed`, {
    status,
    correlationId: correlationIdOf(res),
    error: err instanceof Error ? err.message : String(err),
  });
  if (res.headersSent) {
    res.end();
    return;
  }
  // body-parser errors carry a 4xx status
  const message = status < 500 && err instanceof Error ? err.message : 'Internal Server Error';
  res.status(status).json(createErrorResponse(message, undefined, status < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR'));
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse(`Route not found: ${req.method} ${req.originalUrl}`, undefined, 'NOT_FOUND'));
}
