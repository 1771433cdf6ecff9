// src/delegation/application/IdGenerator.ts

import { randomUUID } from 'crypto';

/**
 * Create a globally unique workflow id.
 *
 * Format: wf_<uuid_without_dashes>
 */
export function createWorkflowId(): string {
  return `wf_${randomUUID().replace(/-/g, '')}`;
}

/**
 * Correlation id used when the caller did not send one.
 */
export function createCorrelationId(): string {
  return randomUUID();
}
