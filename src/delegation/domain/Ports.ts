/**
 * Ports to collaborators whose internals live outside this service.
 */

import type { AgentDescriptor } from './Agent';

export interface Classification {
  label: string;

  /**
   * In [0..1].
   */
  confidence: number;
}

/**
 * Produces a topic label from free text. Treated as opaque.
 */
export interface TopicClassifier {
  classify(text: string): Classification | Promise<Classification>;
}

/**
 * Handles tasks that stay inside the front-end.
 */
export interface LocalHandler {
  handle(taskText: string, topic?: string): Promise<string>;
}

export interface DispatchOptions {
  correlationId: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Sends one task to one remote agent through the resilience chain.
 */
export interface AgentDispatcher {
  dispatch(agent: AgentDescriptor, taskText: string, options: DispatchOptions): Promise<string>;
}
