// src/http/errors/errorEnvelope.ts

/**
 * Standard error envelope
 *
 * Every non-2xx response from the gateway uses this body. `code` is stable
 * and machine-readable; `message` is for humans.
 */

import type { Response } from 'express';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'INTERNAL_SERVER_ERROR'
  | 'AGENT_NOT_FOUND'
  | 'AGENT_COMMUNICATION_ERROR'
  | 'CIRCUIT_OPEN'
  | 'RATE_LIMITED'
  | 'WORKFLOW_PARTIAL_FAILURE'
  | 'FALLBACK_EXHAUSTED';

export type ErrorEnvelopeParams = {
  code: ErrorCode;
  message: string;
  correlationId?: string;

  /**
   * Validation problems, one sentence each.
   */
  issues?: string[];

  /**
   * Structured context: limiter state, step results, fallback attempts.
   */
  details?: unknown;
};

export type ErrorEnvelope = {
  error: ErrorEnvelopeParams;
};

export function buildErrorEnvelope(params: ErrorEnvelopeParams): ErrorEnvelope {
  return {
    error: {
      code: params.code,
      message: params.message,
      ...(params.correlationId ? { correlationId: params.correlationId } : {}),
      ...(params.issues ? { issues: params.issues } : {}),
      ...(params.details !== undefined ? { details: params.details } : {}),
    },
  };
}

export function sendError(res: Response, status: number, params: ErrorEnvelopeParams): void {
  res.status(status).json(buildErrorEnvelope(params));
}
