// src/bootstrap/buildDeps.ts

/**
 * Composition Root
 * ----------------
 * The only place that wires infrastructure + application services.
 *
 * - Registry, pool, breakers and limiter are created here and injected;
 *   there are no module-level singletons for them.
 * - app.ts depends on route ports, not on these concrete classes.
 */

import type { AppDeps } from '../app';
import { config as defaultConfig, type AppConfig } from '../shared/config/Config';
import { logger as defaultLogger, type AppLogger } from '../shared/logging/Logger';

import { AgentRegistry } from '../delegation/application/AgentRegistry';
import { AgentGateway } from '../delegation/application/AgentGateway';
import { MessageRouter } from '../delegation/application/MessageRouter';
import { WorkflowOrchestrator } from '../delegation/application/WorkflowOrchestrator';
import { normalizeAgentName } from '../delegation/domain/Agent';
import type { LocalHandler, TopicClassifier } from '../delegation/domain/Ports';
import { EnvAgentSource, JsonFileAgentSource } from '../delegation/infrastructure/AgentSources';
import { KeywordTopicClassifier } from '../delegation/infrastructure/KeywordTopicClassifier';
import { DEFAULT_RETRY_POLICY } from '../delegation/infrastructure/RetryPolicy';
import { loadRoutingTable } from '../delegation/infrastructure/RoutingConfigLoader';
import { StaticLocalHandler } from '../delegation/infrastructure/StaticLocalHandler';
import type { TransportClientOptions } from '../delegation/infrastructure/TransportClient';
import { TransportPool } from '../delegation/infrastructure/TransportPool';

import { CircuitBreakerRegistry } from '../resilience/application/CircuitBreakerRegistry';
import { SlidingWindowRateLimiter } from '../resilience/application/RateLimiter';

export type RuntimeDeps = AppDeps & {
  registry: AgentRegistry;
  pool: TransportPool;
  breakers: CircuitBreakerRegistry;
  limiter: SlidingWindowRateLimiter;

  /**
   * Called during graceful shutdown to drain and release agent connections.
   */
  shutdown: () => Promise<void>;
};

export type BuildDepsOverrides = {
  config?: AppConfig;
  env?: NodeJS.ProcessEnv;
  classifier?: TopicClassifier;
  localHandler?: LocalHandler;
  transport?: Pick<TransportClientOptions, 'adapter' | 'sleep' | 'random'>;
  logger?: AppLogger;
};

/**
 * Builds runtime dependencies for the delegation gateway.
 */
export function buildRuntimeDeps(overrides: BuildDepsOverrides = {}): RuntimeDeps {
  const config = overrides.config ?? defaultConfig;
  const log = overrides.logger ?? defaultLogger;

  // 1) Agent directory: file first, then environment (env wins on name clashes).
  const registry = new AgentRegistry(log);
  registry.loadFromSource(new JsonFileAgentSource(config.agentsConfigPath));
  if (config.agentsFromEnv) {
    registry.loadFromSource(new EnvAgentSource(overrides.env ?? process.env));
  }

  // 2) Resilience chain.
  const pool = new TransportPool({
    timeoutMs: config.transport.timeoutMs,
    retry: {
      ...DEFAULT_RETRY_POLICY,
      maxRetries: config.transport.maxRetries,
      baseDelayMs: config.transport.baseDelayMs,
      maxDelayMs: config.transport.maxDelayMs,
    },
    logger: log,
    ...overrides.transport,
  });
  const breakers = new CircuitBreakerRegistry({
    failureThreshold: config.circuitBreaker.failureThreshold,
    openTimeoutMs: config.circuitBreaker.openTimeoutMs,
    logger: log,
  });
  const limiter = new SlidingWindowRateLimiter();

  const gateway = new AgentGateway({
    pool,
    breakers,
    limiter,
    defaults: {
      timeoutMs: config.transport.timeoutMs,
      failureThreshold: config.circuitBreaker.failureThreshold,
      openTimeoutMs: config.circuitBreaker.openTimeoutMs,
      rateLimitPerMinute: config.rateLimitPerMinute,
    },
    logger: log,
  });

  // 3) Orchestration + routing.
  const orchestrator = new WorkflowOrchestrator({
    directory: registry,
    dispatcher: gateway,
    defaultTimeoutMs: config.workflowTimeoutMs,
    logger: log,
  });

  const routing = loadRoutingTable(config.routingConfigPath);
  const router = new MessageRouter({
    directory: registry,
    dispatcher: gateway,
    classifier: overrides.classifier ?? new KeywordTopicClassifier(routing),
    localHandler: overrides.localHandler ?? new StaticLocalHandler(routing),
    routing,
    logger: log,
  });

  log.info(
    { agents: registry.size, capabilities: registry.listCapabilities(), topics: routing.rules.length },
    'Delegation gateway wired',
  );

  return {
    router,
    workflows: orchestrator,
    agents: registry,
    health: gateway,
    resilience: {
      snapshot: () => ({
        circuits: breakers.snapshot(),
        rateLimiter: limiter.stats(),
        transport: { clients: pool.size },
      }),
      resetCircuit: (agentName) => {
        const breaker = breakers.get(normalizeAgentName(registry.requireByName(agentName).name));
        breaker.reset();
        log.info({ circuit: breaker.name }, 'Circuit reset by operator');
        return breaker.snapshot();
      },
      openCircuit: (agentName) => {
        const breaker = breakers.get(normalizeAgentName(registry.requireByName(agentName).name));
        breaker.forceOpen();
        log.warn({ circuit: breaker.name }, 'Circuit opened by operator');
        return breaker.snapshot();
      },
    },
    service: { name: config.serviceName, version: config.serviceVersion },

    registry,
    pool,
    breakers,
    limiter,
    shutdown: async () => {
      await pool.closeAll(config.shutdownGraceMs);
    },
  };
}
