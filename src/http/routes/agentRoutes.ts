// src/http/routes/agentRoutes.ts

/**
 * /v1/agents routes: runtime view and mutation of the agent directory.
 */

import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';

import type { AgentDescriptor } from '../../delegation/domain/Agent';
import { parseAgentDescriptorDto } from '../../delegation/dto/AgentDescriptorDto';

export interface AgentDirectoryPort {
  register(descriptor: AgentDescriptor): void;
  unregister(name: string): boolean;
  has(name: string): boolean;

  /**
   * Throws AgentNotFoundError for unknown names.
   */
  requireByName(name: string): AgentDescriptor;

  findByCapability(capability: string): AgentDescriptor[];
  list(): AgentDescriptor[];
}

export interface AgentHealthPort {
  checkHealth(agent: AgentDescriptor): Promise<boolean>;
}

export function createAgentRoutes(directory: AgentDirectoryPort, health: AgentHealthPort): Router {
  const router = Router();

  router.get('/v1/agents', (req: Request, res: Response) => {
    const capability = typeof req.query.capability === 'string' ? req.query.capability.trim() : '';
    const agents = capability.length > 0 ? directory.findByCapability(capability) : directory.list();
    res.status(200).json({ agents });
  });

  router.get('/v1/agents/:name', (req: Request<{ name: string }>, res: Response, next: NextFunction) => {
    try {
      res.status(200).json(directory.requireByName(req.params.name));
    } catch (err) {
      next(err);
    }
  });

  // 200 either way; the body says whether the agent answered its health probe.
  router.get('/v1/agents/:name/health', async (req: Request<{ name: string }>, res: Response, next: NextFunction) => {
    try {
      const agent = directory.requireByName(req.params.name);
      const healthy = await health.checkHealth(agent);
      res.status(200).json({ agent: agent.name, endpoint: agent.endpoint, healthy });
    } catch (err) {
      next(err);
    }
  });

  router.put('/v1/agents', (req: Request, res: Response, next: NextFunction) => {
    try {
      const descriptor = parseAgentDescriptorDto(req.body);
      const existed = directory.has(descriptor.name);
      directory.register(descriptor);
      res.status(existed ? 200 : 201).json(descriptor);
    } catch (err) {
      next(err);
    }
  });

  router.delete('/v1/agents/:name', (req: Request<{ name: string }>, res: Response) => {
    directory.unregister(req.params.name);
    res.status(204).send();
  });

  return router;
}
