// src/http/routes/workflowRoutes.ts

/**
 * /v1/workflows/* routes
 *
 * - completed workflows return 200 with the WorkflowResult
 * - partial / failed workflows go through WorkflowPartialFailureError
 *   (207 / 502, full step detail in error.details)
 */

import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';

import { WorkflowPartialFailureError } from '../../delegation/domain/Errors';
import type {
  FallbackResult,
  WorkflowResult,
  WorkflowRunOptions,
  WorkflowStepSpec,
} from '../../delegation/domain/Workflow';
import {
  parseFallbackDto,
  parseParallelWorkflowDto,
  parseSequentialWorkflowDto,
} from '../../delegation/dto/WorkflowRequestDto';
import { correlationIdOf } from '../middleware/correlationId';

export interface WorkflowRunnerPort {
  runSequential(steps: WorkflowStepSpec[], options: WorkflowRunOptions): Promise<WorkflowResult>;
  runParallel(tasks: WorkflowStepSpec[], options: WorkflowRunOptions): Promise<WorkflowResult>;
  runFallback(
    task: string,
    candidates: string[],
    options: { correlationId?: string; timeoutMs?: number },
  ): Promise<FallbackResult>;
}

function respondWithResult(res: Response, result: WorkflowResult): void {
  if (result.status !== 'completed') {
    throw new WorkflowPartialFailureError(result);
  }
  res.status(200).json(result);
}

export function createWorkflowRoutes(runner: WorkflowRunnerPort): Router {
  const router = Router();

  router.post('/v1/workflows/sequential', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const dto = parseSequentialWorkflowDto(req.body);
      const result = await runner.runSequential(dto.steps, {
        ...dto.options,
        correlationId: correlationIdOf(req),
      });
      respondWithResult(res, result);
    } catch (err) {
      next(err);
    }
  });

  router.post('/v1/workflows/parallel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const dto = parseParallelWorkflowDto(req.body);
      const result = await runner.runParallel(dto.tasks, {
        ...dto.options,
        correlationId: correlationIdOf(req),
      });
      respondWithResult(res, result);
    } catch (err) {
      next(err);
    }
  });

  router.post('/v1/workflows/fallback', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const dto = parseFallbackDto(req.body);
      const result = await runner.runFallback(dto.task, dto.agents, {
        correlationId: correlationIdOf(req),
        ...(dto.timeoutMs !== undefined ? { timeoutMs: dto.timeoutMs } : {}),
      });
      res.status(200).json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
