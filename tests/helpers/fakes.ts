// tests/helpers/fakes.ts

import type { AppDeps } from '../../src/app';
import type { AgentDescriptor } from '../../src/delegation/domain/Agent';
import { AgentNotFoundError } from '../../src/delegation/domain/Errors';
import type { AgentDispatcher, DispatchOptions } from '../../src/delegation/domain/Ports';
import { createLogger } from '../../src/shared/logging/Logger';

export const silentLogger = createLogger({ level: 'silent', env: 'test' });

export function makeDescriptor(
  name: string,
  capabilities: string[] = [],
  overrides: Partial<AgentDescriptor> = {},
): AgentDescriptor {
  return {
    name,
    endpoint: `http://agents.test/${name}`,
    capabilities,
    description: `${name} test agent`,
    version: '1.0.0',
    metadata: {},
    ...overrides,
  };
}

export type DispatchCall = {
  agent: string;
  taskText: string;
  options: DispatchOptions;
};

type Behaviour = (taskText: string, options: DispatchOptions) => Promise<string>;

/**
 * Dispatcher whose answers are scripted per agent name.
 * Agents without a script echo "<agent>:<task>".
 */
export class ScriptedDispatcher implements AgentDispatcher {
  public readonly calls: DispatchCall[] = [];
  private readonly behaviours = new Map<string, Behaviour>();

  public on(agent: string, behaviour: Behaviour): this {
    this.behaviours.set(agent, behaviour);
    return this;
  }

  public succeed(agent: string, text: string): this {
    return this.on(agent, async () => text);
  }

  public fail(agent: string, err: Error): this {
    return this.on(agent, async () => {
      throw err;
    });
  }

  /**
   * Never settles unless the signal aborts.
   */
  public hang(agent: string): this {
    return this.on(
      agent,
      (_task, options) =>
        new Promise<string>((_resolve, reject) => {
          options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        }),
    );
  }

  public async dispatch(agent: AgentDescriptor, taskText: string, options: DispatchOptions): Promise<string> {
    this.calls.push({ agent: agent.name, taskText, options });
    const behaviour = this.behaviours.get(agent.name);
    if (!behaviour) return `${agent.name}:${taskText}`;
    return behaviour(taskText, options);
  }

  public calledAgents(): string[] {
    return this.calls.map((c) => c.agent);
  }
}

/**
 * App deps whose services must not be reached; enough for /health and 404s.
 */
export function unreachableAppDeps(): AppDeps {
  const unreachable = async (): Promise<never> => {
    throw new Error('should_not_run');
  };

  return {
    router: { route: unreachable },
    workflows: {
      runSequential: unreachable,
      runParallel: unreachable,
      runFallback: unreachable,
    },
    agents: {
      register: () => undefined,
      unregister: () => false,
      has: () => false,
      requireByName: (name: string) => {
        throw new AgentNotFoundError(name);
      },
      findByCapability: () => [],
      list: () => [],
    },
    health: { checkHealth: unreachable },
    resilience: {
      snapshot: () => ({
        circuits: [],
        rateLimiter: { keys: 0, trackedCalls: 0, windowMs: 60_000 },
        transport: { clients: 0 },
      }),
      resetCircuit: (name: string) => {
        throw new AgentNotFoundError(name);
      },
      openCircuit: (name: string) => {
        throw new AgentNotFoundError(name);
      },
    },
    service: { name: 'agent-delegation-gateway', version: '0.1.0' },
  };
}
