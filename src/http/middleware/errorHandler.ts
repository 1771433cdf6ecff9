// src/http/middleware/errorHandler.ts

/**
 * Global error handler
 *
 * - Maps the delegation error taxonomy to HTTP statuses
 * - Converts DTO / workflow validation errors into HTTP 400
 * - Converts unknown errors into HTTP 500
 * - Always returns the standard error envelope with the correlationId
 */

import type { NextFunction, Request, Response } from 'express';

import { sendError } from '../errors/errorEnvelope';
import { correlationIdOf } from './correlationId';

import {
  AgentNotFoundError,
  CircuitOpenError,
  CommunicationError,
  FallbackExhaustedError,
  RateLimitExceededError,
  WorkflowPartialFailureError,
  WorkflowValidationError,
} from '../../delegation/domain/Errors';
import { AgentDescriptorValidationError } from '../../delegation/dto/AgentDescriptorDto';
import { RequestDtoValidationError } from '../../delegation/dto/RequestDtoValidationError';
import { logger } from '../../shared/logging/Logger';

function retryAfterSeconds(at: Date | null, now: number): number {
  if (!at) return 1;
  return Math.max(1, Math.ceil((at.getTime() - now) / 1000));
}

function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const correlationId = correlationIdOf(req);

  // 400: request payload validation failures (boundary protection)
  if (
    err instanceof RequestDtoValidationError ||
    err instanceof AgentDescriptorValidationError ||
    err instanceof WorkflowValidationError
  ) {
    logger.debug({ correlationId, issues: err.issues }, 'Request validation failed');

    sendError(res, 400, {
      code: 'VALIDATION_ERROR',
      message: err.message,
      correlationId,
      issues: err.issues,
    });
    return;
  }

  if (isMalformedJson(err)) {
    sendError(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Malformed JSON body',
      correlationId,
      issues: ['Body must be valid JSON.'],
    });
    return;
  }

  if (err instanceof AgentNotFoundError) {
    sendError(res, 404, { code: err.code, message: err.message, correlationId });
    return;
  }

  if (err instanceof RateLimitExceededError) {
    res.setHeader('Retry-After', String(retryAfterSeconds(err.resetAt, Date.now())));
    sendError(res, 429, {
      code: err.code,
      message: err.message,
      correlationId,
      details: {
        limit: err.limit,
        remaining: err.remaining,
        resetAt: err.resetAt ? err.resetAt.toISOString() : null,
      },
    });
    return;
  }

  if (err instanceof CircuitOpenError) {
    res.setHeader('Retry-After', String(retryAfterSeconds(err.retryAt, Date.now())));
    sendError(res, 503, {
      code: err.code,
      message: 'Agent temporarily unavailable',
      correlationId,
      details: { retryAt: err.retryAt.toISOString() },
    });
    return;
  }

  // Transport detail stays in the logs.
  if (err instanceof CommunicationError) {
    logger.warn({ correlationId, kind: err.kind, detail: err.detail, endpoint: err.endpoint }, err.message);
    sendError(res, 502, {
      code: err.code,
      message: 'Agent unavailable',
      correlationId,
      details: { kind: err.kind },
    });
    return;
  }

  if (err instanceof WorkflowPartialFailureError) {
    sendError(res, err.result.status === 'partial' ? 207 : 502, {
      code: err.code,
      message: err.message,
      correlationId,
      details: err.result,
    });
    return;
  }

  if (err instanceof FallbackExhaustedError) {
    logger.warn({ correlationId, attempts: err.attempts, timedOut: err.timedOut }, err.message);
    sendError(res, 502, {
      code: err.code,
      message: err.message,
      correlationId,
      details: { attempts: err.attempts, timedOut: err.timedOut },
    });
    return;
  }

  // 500: unknown/unexpected failures
  logger.error({ correlationId, err }, 'Unhandled error in request pipeline');

  sendError(res, 500, {
    code: 'INTERNAL_SERVER_ERROR',
    message: 'An unexpected error occurred.',
    correlationId,
  });
}
