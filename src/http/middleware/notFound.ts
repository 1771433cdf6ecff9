// src/http/middleware/notFound.ts

import type { Request, Response } from 'express';
import { sendError } from '../errors/errorEnvelope';
import { correlationIdOf } from './correlationId';

export function notFound(req: Request, res: Response): void {
  sendError(res, 404, {
    code: 'NOT_FOUND',
    message: `Route not found: ${req.method} ${req.path}`,
    correlationId: correlationIdOf(req),
  });
}
