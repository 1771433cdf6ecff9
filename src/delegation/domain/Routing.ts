/**
 * Topic routing table: maps classifier labels to a remote agent or to
 * local handling.
 */

export type TopicRoute =
  | { kind: 'local' }
  | {
      kind: 'remote';

      /**
       * Resolved with findByCapability; first match wins.
       */
      capability?: string;

      /**
       * Resolved with findByName. Takes precedence over capability.
       */
      agent?: string;
    };

export interface RoutingRule {
  label: string;
  route: TopicRoute;

  /**
   * Used by the built-in keyword classifier only.
   */
  keywords: string[];

  /**
   * Used by the built-in local handler only.
   */
  reply?: string;
}

export interface RoutingTable {
  /**
   * Classifications below this confidence are handled locally.
   */
  minConfidence: number;
  rules: RoutingRule[];
  fallbackReply: string;
}

export type RouteOutcomeKind = 'delegated' | 'local' | 'agent_not_found' | 'unavailable' | 'rate_limited';

export interface RouteOutcome {
  kind: RouteOutcomeKind;

  /**
   * Text shown to the end user.
   */
  reply: string;

  /**
   * How the target was chosen.
   */
  via: 'explicit' | 'topic';

  correlationId: string;
  agent?: string;
  topic?: string;
  confidence?: number;

  /**
   * Registered agent names, on agent_not_found only.
   */
  knownAgents?: string[];
}
