// src/delegation/application/MessageRouter.ts

/**
 * MessageRouter
 * -------------
 * Entry point for one inbound message. Decides between:
 *
 * 1) explicit delegation ("ask the billing agent to ...")
 * 2) topic routing via the classifier and the routing table
 * 3) local handling
 *
 * Remote failures come back as short labeled replies; retry counts and
 * circuit internals stay in the logs.
 */

import type { AgentDescriptor, IAgentDirectory } from '../domain/Agent';
import { CircuitOpenError, CommunicationError, RateLimitExceededError } from '../domain/Errors';
import type { AgentDispatcher, Classification, LocalHandler, TopicClassifier } from '../domain/Ports';
import type { RouteOutcome, RoutingTable } from '../domain/Routing';
import { logger as defaultLogger, type AppLogger } from '../../shared/logging/Logger';
import { parseDelegation } from './DelegationParser';
import { createCorrelationId } from './IdGenerator';

export type MessageRouterDeps = {
  directory: IAgentDirectory;
  dispatcher: AgentDispatcher;
  classifier: TopicClassifier;
  localHandler: LocalHandler;
  routing: RoutingTable;
  logger?: AppLogger;
};

export type RouteOptions = {
  correlationId?: string;
  timeoutMs?: number;
};

const UNKNOWN: Classification = { label: 'unknown', confidence: 0 };

export class MessageRouter {
  private readonly log: AppLogger;

  public constructor(private readonly deps: MessageRouterDeps) {
    this.log = deps.logger ?? defaultLogger;
  }

  public async route(text: string, options: RouteOptions = {}): Promise<RouteOutcome> {
    const correlationId = options.correlationId ?? createCorrelationId();

    // 1) Explicit delegation.
    const delegation = parseDelegation(text);
    if (delegation) {
      const agent = delegation.candidates
        .map((name) => this.deps.directory.findByName(name))
        .find((a): a is AgentDescriptor => a !== null);

      if (!agent) {
        const knownAgents = this.deps.directory.list().map((a) => a.name);
        this.log.info({ correlationId, requested: delegation.requestedName }, 'Delegation target not found');
        return {
          kind: 'agent_not_found',
          reply:
            knownAgents.length > 0
              ? `❌ Agent '${delegation.requestedName}' not found. Known agents: ${knownAgents.join(', ')}.`
              : `❌ Agent '${delegation.requestedName}' not found. No agents are registered.`,
          via: 'explicit',
          correlationId,
          knownAgents,
        };
      }

      return this.dispatch(agent, delegation.taskText, 'explicit', correlationId, options, undefined);
    }

    // 2) Topic routing.
    const classification = await this.classify(text, correlationId);
    const rule = this.deps.routing.rules.find((r) => r.label === classification.label);

    if (
      rule &&
      rule.route.kind === 'remote' &&
      classification.confidence >= this.deps.routing.minConfidence
    ) {
      const route = rule.route;
      const agent =
        (route.agent ? this.deps.directory.findByName(route.agent) : null) ??
        (route.capability ? this.deps.directory.findByCapability(route.capability)[0] ?? null : null);

      if (agent) {
        return this.dispatch(agent, text, 'topic', correlationId, options, classification);
      }

      this.log.info(
        { correlationId, topic: classification.label, route },
        'No agent serves the topic, handling locally',
      );
    }

    // 3) Local handling.
    const confident = classification.confidence >= this.deps.routing.minConfidence;
    const reply = await this.deps.localHandler.handle(text, rule && confident ? rule.label : undefined);
    return {
      kind: 'local',
      reply,
      via: 'topic',
      correlationId,
      topic: classification.label,
      confidence: classification.confidence,
    };
  }

  private async classify(text: string, correlationId: string): Promise<Classification> {
    try {
      return await this.deps.classifier.classify(text);
    } catch (err) {
      this.log.warn({ correlationId, err }, 'Classifier failed, treating topic as unknown');
      return UNKNOWN;
    }
  }

  private async dispatch(
    agent: AgentDescriptor,
    taskText: string,
    via: RouteOutcome['via'],
    correlationId: string,
    options: RouteOptions,
    classification: Classification | undefined,
  ): Promise<RouteOutcome> {
    const base = {
      via,
      correlationId,
      agent: agent.name,
      ...(classification ? { topic: classification.label, confidence: classification.confidence } : {}),
    };

    try {
      const reply = await this.deps.dispatcher.dispatch(agent, taskText, {
        correlationId,
        ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
      });
      return { ...base, kind: 'delegated', reply };
    } catch (err) {
      if (err instanceof RateLimitExceededError) {
        return {
          ...base,
          kind: 'rate_limited',
          reply: `⚠ agent busy: ${agent.name} is handling too many requests. Please try again shortly.`,
        };
      }
      if (err instanceof CircuitOpenError || err instanceof CommunicationError) {
        return {
          ...base,
          kind: 'unavailable',
          reply: `⚠ agent unavailable: ${agent.name} cannot be reached right now. Please try again later.`,
        };
      }
      throw err;
    }
  }
}
