// src/delegation/application/WorkflowOrchestrator.ts

/**
 * WorkflowOrchestrator
 * --------------------
 * Drives several delegations as one request-scoped workflow.
 *
 * Modes:
 * - sequential: steps form a DAG via dependsOn; ready steps start in
 *   declaration order, independent branches run concurrently
 * - parallel: independent tasks fanned out at once; no sibling cancellation
 * - fallback: ordered candidates for one task, first success wins
 *
 * Every remote call goes through the AgentDispatcher (breaker -> limiter ->
 * transport). Durations are recorded for observability only.
 */

import type { IAgentDirectory } from '../domain/Agent';
import {
  AgentNotFoundError,
  CircuitOpenError,
  CommunicationError,
  describeError,
  FallbackExhaustedError,
  RateLimitExceededError,
  WorkflowValidationError,
  type FallbackAttempt,
} from '../domain/Errors';
import type { AgentDispatcher } from '../domain/Ports';
import {
  isTerminal,
  MAX_TIMEOUT_MS,
  type FallbackResult,
  type StepResult,
  type WorkflowMode,
  type WorkflowResult,
  type WorkflowRunOptions,
  type WorkflowStatus,
  type WorkflowStepSpec,
} from '../domain/Workflow';
import { logger as defaultLogger, type AppLogger } from '../../shared/logging/Logger';
import { createWorkflowId } from './IdGenerator';

export type WorkflowOrchestratorDeps = {
  directory: IAgentDirectory;
  dispatcher: AgentDispatcher;

  /**
   * Applied when a run does not set its own timeoutMs. No deadline when omitted.
   */
  defaultTimeoutMs?: number;

  workflowIdProvider?: () => string;
  now?: () => number;
  logger?: AppLogger;
};

export type FallbackOptions = {
  correlationId?: string;

  /**
   * Bounds the whole chain; the call in flight at expiry is aborted.
   */
  timeoutMs?: number;
};

type RunContext = {
  correlationId: string;
  signal: AbortSignal;
};

const DEADLINE = Symbol('deadline');

/**
 * Resolves with DEADLINE once timeoutMs passes; never settles without a timeout.
 * Callers abort their own calls after marking what the deadline cut short.
 */
function startDeadline(timeoutMs: number | undefined): { deadline: Promise<typeof DEADLINE>; clear: () => void } {
  if (timeoutMs === undefined) {
    return { deadline: new Promise<typeof DEADLINE>(() => undefined), clear: () => undefined };
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof DEADLINE>((resolve) => {
    timer = setTimeout(() => resolve(DEADLINE), timeoutMs);
  });
  return { deadline, clear: () => clearTimeout(timer) };
}

/**
 * Reject empty workflows, out-of-range or self dependencies, and cycles.
 */
export function validateWorkflow(steps: WorkflowStepSpec[]): void {
  const issues: string[] = [];

  if (steps.length === 0) {
    throw new WorkflowValidationError('Invalid workflow', ['Workflow must contain at least one step.']);
  }

  steps.forEach((step, index) => {
    for (const dep of step.dependsOn ?? []) {
      if (!Number.isInteger(dep) || dep < 0 || dep >= steps.length) {
        issues.push(`Step ${index} depends on unknown step ${dep}.`);
      } else if (dep === index) {
        issues.push(`Step ${index} depends on itself.`);
      }
    }
  });

  if (issues.length > 0) {
    throw new WorkflowValidationError('Invalid workflow', issues);
  }

  const cyclic = findCyclicSteps(steps);
  if (cyclic.length > 0) {
    throw new WorkflowValidationError('Invalid workflow', [
      `Dependency cycle involving steps ${cyclic.join(', ')}.`,
    ]);
  }
}

/**
 * Kahn's algorithm; returns the indices that never reach in-degree 0.
 */
function findCyclicSteps(steps: WorkflowStepSpec[]): number[] {
  const inDegree = steps.map((s) => new Set(s.dependsOn ?? []).size);
  const dependents = steps.map((): number[] => []);
  steps.forEach((step, index) => {
    for (const dep of new Set(step.dependsOn ?? [])) dependents[dep].push(index);
  });

  const queue = inDegree.flatMap((d, i) => (d === 0 ? [i] : []));
  const visited = new Set<number>();
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined) break;
    visited.add(next);
    for (const dependent of dependents[next]) {
      inDegree[dependent] -= 1;
      if (inDegree[dependent] === 0) queue.push(dependent);
    }
  }

  return steps.flatMap((_, i) => (visited.has(i) ? [] : [i]));
}

/**
 * Errors after which a fallback chain moves on to the next candidate.
 */
export function isFallbackRecoverable(err: unknown): boolean {
  return (
    err instanceof CommunicationError ||
    err instanceof CircuitOpenError ||
    err instanceof RateLimitExceededError ||
    err instanceof AgentNotFoundError
  );
}

export class WorkflowOrchestrator {
  private readonly workflowIdProvider: () => string;
  private readonly now: () => number;
  private readonly log: AppLogger;

  public constructor(private readonly deps: WorkflowOrchestratorDeps) {
    this.workflowIdProvider = deps.workflowIdProvider ?? createWorkflowId;
    this.now = deps.now ?? (() => Date.now());
    this.log = deps.logger ?? defaultLogger;
  }

  /**
   * Run a DAG of steps. Dependents of a step that did not complete are skipped.
   */
  public async runSequential(
    steps: WorkflowStepSpec[],
    options: WorkflowRunOptions = {},
  ): Promise<WorkflowResult> {
    validateWorkflow(steps);
    return this.execute('sequential', steps, options);
  }

  /**
   * Fan out independent tasks and wait for all of them.
   */
  public async runParallel(
    tasks: WorkflowStepSpec[],
    options: WorkflowRunOptions = {},
  ): Promise<WorkflowResult> {
    const independent = tasks.map(({ agent, task }) => ({ agent, task, dependsOn: [] }));
    validateWorkflow(independent);
    return this.execute('parallel', independent, options);
  }

  /**
   * Try candidates in order until one succeeds.
   * Throws FallbackExhaustedError with every failed attempt when none does,
   * or when the deadline passes first.
   */
  public async runFallback(
    task: string,
    candidates: string[],
    options: FallbackOptions = {},
  ): Promise<FallbackResult> {
    const correlationId = options.correlationId ?? this.workflowIdProvider();
    const startedAt = this.now();
    const attempts: FallbackAttempt[] = [];

    const controller = new AbortController();
    const { deadline, clear } = startDeadline(this.timeoutFor(options.timeoutMs));
    let timedOut = false;

    try {
      for (const candidate of candidates) {
        const attemptStartedAt = this.now();
        try {
          const agent = this.deps.directory.resolve(candidate);
          if (!agent) throw new AgentNotFoundError(candidate);

          const outcome = await Promise.race([
            this.deps.dispatcher.dispatch(agent, task, { correlationId, signal: controller.signal }),
            deadline,
          ]);

          if (outcome === DEADLINE) {
            timedOut = true;
            controller.abort();
            attempts.push({
              agent: candidate,
              code: 'WORKFLOW_TIMEOUT',
              message: 'Fallback deadline exceeded while the candidate was running',
              durationMs: this.now() - attemptStartedAt,
            });
            break;
          }

          return { agent: agent.name, result: outcome, attempts, durationMs: this.now() - startedAt };
        } catch (err) {
          if (!isFallbackRecoverable(err)) throw err;

          const { code, message } = describeError(err);
          attempts.push({ agent: candidate, code, message, durationMs: this.now() - attemptStartedAt });
          this.log.warn({ correlationId, candidate, code }, 'Fallback candidate failed, trying next');
        }
      }
    } finally {
      clear();
    }

    throw new FallbackExhaustedError(attempts, timedOut);
  }

  private timeoutFor(requested: number | undefined): number | undefined {
    const timeoutMs = requested ?? this.deps.defaultTimeoutMs;
    return timeoutMs === undefined ? undefined : Math.min(timeoutMs, MAX_TIMEOUT_MS);
  }

  private async execute(
    mode: WorkflowMode,
    specs: WorkflowStepSpec[],
    options: WorkflowRunOptions,
  ): Promise<WorkflowResult> {
    const workflowId = options.workflowId ?? this.workflowIdProvider();
    const correlationId = options.correlationId ?? workflowId;
    const timeoutMs = this.timeoutFor(options.timeoutMs);
    const maxParallel = options.maxParallel ?? Number.POSITIVE_INFINITY;
    const startedAt = this.now();

    const steps: StepResult[] = specs.map((spec, index) => ({
      index,
      agent: spec.agent,
      task: spec.task,
      dependsOn: Array.from(new Set(spec.dependsOn ?? [])),
      status: 'pending',
      durationMs: 0,
    }));

    this.log.info({ workflowId, mode, steps: steps.length, timeoutMs }, 'Workflow started');

    const controller = new AbortController();
    const context: RunContext = { correlationId, signal: controller.signal };
    const stepStartedAt = new Map<number, number>();
    const inFlight = new Map<number, Promise<number>>();

    const { deadline, clear } = startDeadline(timeoutMs);
    let timedOut = false;

    try {
      for (;;) {
        this.skipBlockedSteps(steps);

        // Start ready steps in declaration order.
        for (const step of steps) {
          if (inFlight.size >= maxParallel) break;
          if (step.status !== 'pending') continue;
          if (!step.dependsOn.every((dep) => steps[dep].status === 'completed')) continue;

          step.status = 'running';
          stepStartedAt.set(step.index, this.now());
          inFlight.set(
            step.index,
            this.runStep(step, context).then(() => step.index),
          );
        }

        if (inFlight.size === 0) break;

        const settled = await Promise.race([...inFlight.values(), deadline]);
        if (settled === DEADLINE) {
          timedOut = true;
          controller.abort();
          this.cancelUnfinished(steps, stepStartedAt);
          break;
        }
        inFlight.delete(settled);
      }
    } finally {
      clear();
    }

    const result: WorkflowResult = {
      workflowId,
      mode,
      status: mode === 'sequential' ? sequentialStatus(steps) : parallelStatus(steps),
      steps,
      durationMs: this.now() - startedAt,
      timedOut,
    };

    this.log.info(
      { workflowId, mode, status: result.status, durationMs: result.durationMs, timedOut },
      'Workflow finished',
    );
    return result;
  }

  /**
   * Resolves once the step is terminal; never rejects.
   * A step cancelled while its call was in flight keeps its cancelled status.
   */
  private async runStep(step: StepResult, context: RunContext): Promise<void> {
    const startedAt = this.now();
    try {
      const agent = this.deps.directory.resolve(step.agent);
      if (!agent) throw new AgentNotFoundError(step.agent);
      step.resolvedAgent = agent.name;

      const text = await this.deps.dispatcher.dispatch(agent, step.task, {
        correlationId: context.correlationId,
        signal: context.signal,
      });

      if (step.status !== 'running') return;
      step.status = 'completed';
      step.result = text;
      step.durationMs = this.now() - startedAt;
    } catch (err) {
      if (step.status !== 'running') return;
      step.status = 'failed';
      step.error = describeError(err);
      step.durationMs = this.now() - startedAt;
    }
  }

  /**
   * Mark pending steps whose dependencies are terminal but not all completed.
   * Repeats until stable so skips propagate down the graph.
   */
  private skipBlockedSteps(steps: StepResult[]): void {
    let changed = true;
    while (changed) {
      changed = false;
      for (const step of steps) {
        if (step.status !== 'pending') continue;

        const deps = step.dependsOn.map((dep) => steps[dep]);
        if (!deps.every((d) => isTerminal(d.status))) continue;

        const blocker = deps.find((d) => d.status !== 'completed');
        if (!blocker) continue;

        step.status = 'skipped';
        step.error = {
          code: 'DEPENDENCY_NOT_COMPLETED',
          message: `Dependency step ${blocker.index} ended as ${blocker.status}`,
        };
        changed = true;
      }
    }
  }

  private cancelUnfinished(steps: StepResult[], stepStartedAt: Map<number, number>): void {
    const now = this.now();
    for (const step of steps) {
      if (step.status === 'running') {
        step.status = 'cancelled';
        step.error = { code: 'WORKFLOW_TIMEOUT', message: 'Workflow deadline exceeded while the step was running' };
        step.durationMs = now - (stepStartedAt.get(step.index) ?? now);
      } else if (step.status === 'pending') {
        step.status = 'cancelled';
        step.error = { code: 'WORKFLOW_TIMEOUT', message: 'Workflow deadline exceeded before the step started' };
      }
    }
  }
}

/**
 * completed iff every step completed; failed if the first runnable step
 * failed or nothing completed; partial otherwise.
 */
export function sequentialStatus(steps: StepResult[]): WorkflowStatus {
  if (steps.every((s) => s.status === 'completed')) return 'completed';

  const firstRunnable = steps.find((s) => s.dependsOn.length === 0);
  if (firstRunnable?.status === 'failed') return 'failed';
  if (!steps.some((s) => s.status === 'completed')) return 'failed';

  return 'partial';
}

export function parallelStatus(steps: StepResult[]): WorkflowStatus {
  const completed = steps.filter((s) => s.status === 'completed').length;
  if (completed === steps.length) return 'completed';
  if (completed === 0) return 'failed';
  return 'partial';
}
