// Last-resort JSON error and 404 handlers
import type { Request, Response, NextFunction } from 'express';
import { errorMessage } from '@/core/errors';
import { logger } from '@/services/logger';
import { createErrorResponse, errorToResponse } from '@/utils/errorResponse';
import { correlationIdOf } from './correlation';

/** Maps body-parser failures (malformed JSON, oversized body) to 4xx; everything else via errorToResponse. */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const correlationId = correlationIdOf(res);
  const httpStatus = bodyParserStatus(err);
  if (httpStatus !== null) {
    logger.warn('request rejected', { correlationId, path: req.path, status: httpStatus, error: errorMessage(err) });
    res.status(httpStatus).json(createErrorResponse(errorMessage(err), undefined, 'bad_request'));
    return;
  }
  const { status, body } = errorToResponse(err);
  logger.error('Unhandled error', { correlationId, path: req.path, error: errorMessage(err) });
  res.status(status).json(body);
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse(`Route ${req.method} ${req.path} not found`, undefined, 'not_found'));
}

function bodyParserStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}
