// src/delegation/application/AgentGateway.ts

import { normalizeAgentName, readMetadataNumber, type AgentDescriptor } from '../domain/Agent';
import type { AgentDispatcher, DispatchOptions } from '../domain/Ports';
import { describeError } from '../domain/Errors';
import type { TransportPool } from '../infrastructure/TransportPool';
import type { CircuitBreakerRegistry } from '../../resilience/application/CircuitBreakerRegistry';
import type { SlidingWindowRateLimiter } from '../../resilience/application/RateLimiter';
import { logger as defaultLogger, type AppLogger } from '../../shared/logging/Logger';

/**
 * Service-wide defaults; descriptor metadata overrides them per agent.
 */
export type AgentGatewayDefaults = {
  timeoutMs: number;
  failureThreshold: number;
  openTimeoutMs: number;
  rateLimitPerMinute: number;
};

export type AgentGatewayDeps = {
  pool: TransportPool;
  breakers: CircuitBreakerRegistry;
  limiter: SlidingWindowRateLimiter;
  defaults: AgentGatewayDefaults;
  logger?: AppLogger;
  now?: () => number;
};

/**
 * The resilience chain in front of every remote call:
 * CircuitBreaker -> RateLimiter -> TransportClient.
 *
 * Circuit and rate-limit rejections are never retried here.
 */
export class AgentGateway implements AgentDispatcher {
  private readonly log: AppLogger;
  private readonly now: () => number;

  public constructor(private readonly deps: AgentGatewayDeps) {
    this.log = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => Date.now());
  }

  public async dispatch(
    agent: AgentDescriptor,
    taskText: string,
    options: DispatchOptions,
  ): Promise<string> {
    const key = normalizeAgentName(agent.name);
    const { defaults } = this.deps;

    const breaker = this.deps.breakers.get(key, {
      failureThreshold: readMetadataNumber(agent, 'failureThreshold') ?? defaults.failureThreshold,
      openTimeoutMs: readMetadataNumber(agent, 'openTimeoutMs') ?? defaults.openTimeoutMs,
    });
    const limit = readMetadataNumber(agent, 'rateLimitPerMinute') ?? defaults.rateLimitPerMinute;
    const timeoutMs = options.timeoutMs ?? readMetadataNumber(agent, 'timeoutMs') ?? defaults.timeoutMs;

    // A closed pool says nothing about the agent, so this stays outside the breaker.
    const client = this.deps.pool.getClient(agent.endpoint);

    const startedAt = this.now();
    try {
      const text = await breaker.execute(async () => {
        this.deps.limiter.acquire(key, limit);
        return client.delegate(taskText, options.correlationId, {
          timeoutMs,
          ...(options.signal ? { signal: options.signal } : {}),
        });
      });

      this.log.info(
        { agent: key, correlationId: options.correlationId, durationMs: this.now() - startedAt },
        'Delegation completed',
      );
      return text;
    } catch (err) {
      const { code, message } = describeError(err);
      this.log.warn(
        {
          agent: key,
          correlationId: options.correlationId,
          durationMs: this.now() - startedAt,
          code,
          circuit: breaker.getState(),
        },
        message,
      );
      throw err;
    }
  }

  /**
   * GET <endpoint>/health through the pooled client; false on any failure.
   */
  public async checkHealth(agent: AgentDescriptor): Promise<boolean> {
    const healthy = await this.deps.pool.getClient(agent.endpoint).healthCheck();
    this.log.debug({ agent: normalizeAgentName(agent.name), healthy }, 'Agent health checked');
    return healthy;
  }
}
