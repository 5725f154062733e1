import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

const HEADER = 'x-correlation-id';

export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header(HEADER);
  const correlationId = headerId && headerId.length <= 128 ? headerId : randomUUID();

  res.locals.correlationId = correlationId;
  res.setHeader(HEADER, correlationId);
  next();
}

export function correlationIdOf(res: Response): string | undefined {
  const id: unknown = res.locals.correlationId;
  return typeof id === 'string' ? id : undefined;
}
