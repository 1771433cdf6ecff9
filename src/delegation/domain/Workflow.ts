/**
 * Workflow domain models.
 *
 * A workflow is a request-scoped set of delegated tasks. It is created per
 * invocation and discarded once the result has been returned.
 */

import type { FallbackAttempt } from './Errors';

export type WorkflowMode = 'sequential' | 'parallel';

/**
 * One delegated task inside a workflow.
 */
export interface WorkflowStepSpec {
  /**
   * Agent name or capability tag.
   */
  agent: string;

  /**
   * Task text sent to the agent.
   */
  task: string;

  /**
   * Indices of steps that must reach a terminal state first.
   */
  dependsOn?: number[];
}

export interface WorkflowSpec {
  steps: WorkflowStepSpec[];
}

/**
 * Largest delay a Node timer honours; longer ones fire after 1 ms.
 */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface WorkflowRunOptions {
  /**
   * Bounds the whole workflow. Pending and in-flight steps are cancelled on expiry.
   */
  timeoutMs?: number;

  /**
   * Maximum number of steps in flight at once. Unbounded when omitted.
   */
  maxParallel?: number;

  correlationId?: string;
  workflowId?: string;
}

export type StepStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped' | 'cancelled';

export type WorkflowStatus = 'completed' | 'partial' | 'failed';

export interface StepError {
  code: string;
  message: string;
}

export interface StepResult {
  index: number;
  agent: string;
  task: string;
  dependsOn: number[];
  status: StepStatus;

  /**
   * Name of the agent that actually served the step (after capability lookup).
   */
  resolvedAgent?: string;

  result?: string;
  error?: StepError;

  /**
   * Wall-clock duration; 0 for steps that never started.
   */
  durationMs: number;
}

export interface WorkflowResult {
  workflowId: string;
  mode: WorkflowMode;
  status: WorkflowStatus;
  steps: StepResult[];
  durationMs: number;

  /**
   * True when the caller-supplied deadline cut the run short.
   */
  timedOut: boolean;
}

export interface FallbackResult {
  agent: string;
  result: string;

  /**
   * Candidates tried (and failed) before the successful one.
   */
  attempts: FallbackAttempt[];
  durationMs: number;
}

export function isTerminal(status: StepStatus): boolean {
  return status !== 'pending' && status !== 'running';
}
