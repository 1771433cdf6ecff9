// src/http/routes/resilienceRoutes.ts

/**
 * /v1/resilience routes, for operators:
 * - GET: breaker states and limiter windows
 * - POST .../circuits/:name/reset closes an agent's circuit
 * - POST .../circuits/:name/open trips it by hand (e.g. during agent maintenance)
 */

import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';

import type { CircuitSnapshot } from '../../resilience/application/CircuitBreaker';
import type { RateLimiterStats } from '../../resilience/application/RateLimiter';

export type ResilienceSnapshot = {
  circuits: CircuitSnapshot[];
  rateLimiter: RateLimiterStats;
  transport: { clients: number };
};

export interface ResiliencePort {
  snapshot(): ResilienceSnapshot;

  /**
   * Both throw AgentNotFoundError for names missing from the registry.
   */
  resetCircuit(agentName: string): CircuitSnapshot;
  openCircuit(agentName: string): CircuitSnapshot;
}

export function createResilienceRoutes(resilience: ResiliencePort): Router {
  const router = Router();

  router.get('/v1/resilience', (_req: Request, res: Response) => {
    res.status(200).json(resilience.snapshot());
  });

  router.post('/v1/resilience/circuits/:name/reset', (req: Request<{ name: string }>, res: Response, next: NextFunction) => {
    try {
      res.status(200).json(resilience.resetCircuit(req.params.name));
    } catch (err) {
      next(err);
    }
  });

  router.post('/v1/resilience/circuits/:name/open', (req: Request<{ name: string }>, res: Response, next: NextFunction) => {
    try {
      res.status(200).json(resilience.openCircuit(req.params.name));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
