/**
 * Delegation error taxonomy.
 *
 * Every error carries a stable `code` so the HTTP layer and the router can
 * map it without string matching.
 */

import type { WorkflowResult } from './Workflow';

export abstract class DelegationError extends Error {
  public abstract readonly code: string;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Unresolved agent name or capability. Recoverable: surfaced as a hint.
 */
export class AgentNotFoundError extends DelegationError {
  public readonly code = 'AGENT_NOT_FOUND';

  public constructor(public readonly identifier: string) {
    super(`Agent not found: ${identifier}`);
  }
}

export type CommunicationErrorKind =
  | 'timeout'
  | 'connection_refused'
  | 'protocol_error'
  | 'remote_error';

export class CommunicationError extends DelegationError {
  public readonly code = 'AGENT_COMMUNICATION_ERROR';

  public constructor(
    public readonly kind: CommunicationErrorKind,
    public readonly detail: string,
    public readonly endpoint?: string,
    public readonly attempts = 1,
  ) {
    super(`Agent communication failed (${kind}): ${detail}`);
  }

  /**
   * Transient failures are retried by the transport; the rest surface at once.
   */
  public get transient(): boolean {
    return this.kind === 'timeout' || this.kind === 'connection_refused';
  }
}

/**
 * The caller gave up (workflow deadline, fallback deadline) before the agent
 * answered. Says nothing about the agent's health.
 */
export class CallAbandonedError extends CommunicationError {
  public constructor(endpoint?: string, attempts = 1) {
    super('timeout', 'Call abandoned by caller', endpoint, attempts);
  }
}

export class CircuitOpenError extends DelegationError {
  public readonly code = 'CIRCUIT_OPEN';

  public constructor(
    public readonly circuitName: string,
    public readonly retryAt: Date,
  ) {
    super(`Circuit '${circuitName}' is open`);
  }
}

export class RateLimitExceededError extends DelegationError {
  public readonly code = 'RATE_LIMITED';

  public constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly remaining: number,
    public readonly resetAt: Date | null,
  ) {
    super(`Rate limit of ${limit}/min exceeded for '${key}'`);
  }
}

/**
 * Workflow submission rejected before anything ran (empty spec, bad
 * dependency index, cycle).
 */
export class WorkflowValidationError extends DelegationError {
  public readonly code = 'VALIDATION_ERROR';

  public constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
  }
}

/**
 * Some workflow steps did not complete. Carries the full step-level result.
 */
export class WorkflowPartialFailureError extends DelegationError {
  public readonly code = 'WORKFLOW_PARTIAL_FAILURE';

  public constructor(public readonly result: WorkflowResult) {
    const failed = result.steps.filter((s) => s.status !== 'completed').length;
    super(`Workflow ${result.workflowId} ${result.status}: ${failed} of ${result.steps.length} steps did not complete`);
  }
}

export interface FallbackAttempt {
  agent: string;
  code: string;
  message: string;
  durationMs: number;
}

export class FallbackExhaustedError extends DelegationError {
  public readonly code = 'FALLBACK_EXHAUSTED';

  /**
   * Per-candidate codes stay in `attempts`; the message is shown to callers.
   */
  public constructor(
    public readonly attempts: FallbackAttempt[],
    public readonly timedOut = false,
  ) {
    super(
      timedOut
        ? 'Fallback deadline exceeded before any candidate succeeded'
        : attempts.length === 0
          ? 'No fallback candidates were attempted'
          : `All ${attempts.length} fallback candidates failed`,
    );
  }
}

/**
 * Map any thrown value to a short code/message pair for step results.
 */
export function describeError(err: unknown): { code: string; message: string } {
  if (err instanceof DelegationError) {
    return { code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { code: 'INTERNAL_ERROR', message: err.message };
  }
  return { code: 'INTERNAL_ERROR', message: String(err) };
}
