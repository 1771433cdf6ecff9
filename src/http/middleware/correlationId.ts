// src/http/middleware/correlationId.ts

/**
 * Correlation ID middleware
 *
 * Rules:
 * 1) Prefer header: x-correlation-id
 * 2) Otherwise generate a UUID
 *
 * Outputs:
 * - req.correlationId (typed via module augmentation below)
 * - response header x-correlation-id
 *
 * The same id is forwarded to remote agents in the delegation envelope.
 */

import type { NextFunction, Request, Response } from 'express';

import { createCorrelationId } from '../../delegation/application/IdGenerator';

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

const MAX_CORRELATION_ID_LENGTH = 128;

export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header('x-correlation-id')?.trim();

  const correlationId =
    headerId && headerId.length > 0 && headerId.length <= MAX_CORRELATION_ID_LENGTH
      ? headerId
      : createCorrelationId();

  req.correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);

  next();
}

/**
 * The request's correlation id; generated on the spot when the middleware did not run.
 */
export function correlationIdOf(req: Request): string {
  if (!req.correlationId) {
    req.correlationId = createCorrelationId();
  }
  return req.correlationId;
}
