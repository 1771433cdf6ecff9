/**
 * Agent directory domain models.
 *
 * An agent is an independently deployed service that implements the
 * task-delegation RPC contract. The registry keeps one descriptor per
 * agent name.
 */

/**
 * Registry record identifying an agent.
 */
export interface AgentDescriptor {
  /**
   * Unique identifier inside a registry. Compared case-insensitively.
   * Example: "billing_agent".
   */
  name: string;

  /**
   * Absolute http(s) URL that accepts the delegation envelope.
   */
  endpoint: string;

  /**
   * Capability tags, e.g. ["billing", "refunds"].
   */
  capabilities: string[];

  description: string;
  version: string;

  /**
   * Open map. Numeric keys `failureThreshold`, `openTimeoutMs`,
   * `rateLimitPerMinute` and `timeoutMs` tune the resilience chain per agent.
   */
  metadata: Record<string, unknown>;
}

/**
 * Read side of the registry, as seen by the router and the orchestrator.
 */
export interface IAgentDirectory {
  findByName(name: string): AgentDescriptor | null;
  findByCapability(capability: string): AgentDescriptor[];

  /**
   * Name first, then the first agent declaring the capability.
   */
  resolve(identifier: string): AgentDescriptor | null;

  list(): AgentDescriptor[];
}

/**
 * Canonical registry key for an agent name.
 */
export function normalizeAgentName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Read a positive number from descriptor metadata, if present.
 */
export function readMetadataNumber(
  descriptor: AgentDescriptor,
  key: 'failureThreshold' | 'openTimeoutMs' | 'rateLimitPerMinute' | 'timeoutMs',
): number | undefined {
  const value = descriptor.metadata[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) return undefined;
  return value;
}
