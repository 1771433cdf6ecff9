// src/http/routes/messageRoutes.ts

/**
 * POST /v1/messages
 *
 * Thin boundary: validate -> MessageRouter.route -> return the outcome.
 * Routing failures (unknown agent, agent down, agent busy) are outcomes,
 * not HTTP errors.
 */

import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';

import type { RouteOutcome } from '../../delegation/domain/Routing';
import { parseMessageDto } from '../../delegation/dto/WorkflowRequestDto';
import { correlationIdOf } from '../middleware/correlationId';

export interface MessageRouterPort {
  route(text: string, options: { correlationId?: string; timeoutMs?: number }): Promise<RouteOutcome>;
}

export function createMessageRoutes(router: MessageRouterPort): Router {
  const routes = Router();

  routes.post('/v1/messages', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const dto = parseMessageDto(req.body);
      const outcome = await router.route(dto.text, {
        correlationId: correlationIdOf(req),
        ...(dto.timeoutMs !== undefined ? { timeoutMs: dto.timeoutMs } : {}),
      });
      res.status(200).json(outcome);
    } catch (err) {
      next(err);
    }
  });

  return routes;
}
