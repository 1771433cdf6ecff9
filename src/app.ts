/**
 * Express application setup for the delegation gateway.
 *
 * This module:
 * - Creates and configures the Express 5 app instance.
 * - Registers global middleware (JSON parsing, correlation ids, request logging).
 * - Exposes a healthcheck endpoint for monitoring.
 * - Mounts the message, workflow, agent and resilience routes.
 *
 * Routes depend on ports only; concrete services are wired in bootstrap/buildDeps.ts.
 */
import express, { Application, NextFunction, Request, Response } from 'express';

import { config } from './shared/config/Config';
import { logger } from './shared/logging/Logger';
import { correlationIdMiddleware } from './http/middleware/correlationId';
import { errorHandler } from './http/middleware/errorHandler';
import { notFound } from './http/middleware/notFound';
import { createAgentRoutes, type AgentDirectoryPort, type AgentHealthPort } from './http/routes/agentRoutes';
import { createMessageRoutes, type MessageRouterPort } from './http/routes/messageRoutes';
import { createResilienceRoutes, type ResiliencePort } from './http/routes/resilienceRoutes';
import { createWorkflowRoutes, type WorkflowRunnerPort } from './http/routes/workflowRoutes';

export type AppDeps = {
  router: MessageRouterPort;
  workflows: WorkflowRunnerPort;
  agents: AgentDirectoryPort;
  health: AgentHealthPort;
  resilience: ResiliencePort;

  service?: {
    name: string;
    version: string;
  };
};

export function createApp(deps: AppDeps): Application {
  const app = express();
  const service = deps.service ?? { name: config.serviceName, version: config.serviceVersion };

  // Correlation id first so even body-parse failures carry one.
  app.use(correlationIdMiddleware);
  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(
      { method: req.method, path: req.path, correlationId: req.correlationId },
      'Incoming request',
    );
    next();
  });

  // Basic healthcheck endpoint used by Kubernetes / monitors
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      service: service.name,
      version: service.version,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(createMessageRoutes(deps.router));
  app.use(createWorkflowRoutes(deps.workflows));
  app.use(createAgentRoutes(deps.agents, deps.health));
  app.use(createResilienceRoutes(deps.resilience));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
