// tests/application/messageRouter.application.test.ts

import path from 'path';

import { AgentRegistry } from '../../src/delegation/application/AgentRegistry';
import { MessageRouter } from '../../src/delegation/application/MessageRouter';
import { CircuitOpenError, CommunicationError, RateLimitExceededError } from '../../src/delegation/domain/Errors';
import type { TopicClassifier } from '../../src/delegation/domain/Ports';
import { KeywordTopicClassifier } from '../../src/delegation/infrastructure/KeywordTopicClassifier';
import { loadRoutingTable } from '../../src/delegation/infrastructure/RoutingConfigLoader';
import { StaticLocalHandler } from '../../src/delegation/infrastructure/StaticLocalHandler';
import { makeDescriptor, ScriptedDispatcher, silentLogger } from '../helpers/fakes';

const routing = loadRoutingTable(path.join(__dirname, '..', '..', 'config', 'routing.json'));
const GREETING = 'Hello! I can answer questions about billing, support tickets, your account, weather and insurance.';

function setup(options: { classifier?: TopicClassifier; agents?: boolean } = {}) {
  const registry = new AgentRegistry(silentLogger);
  if (options.agents !== false) {
    registry.register(makeDescriptor('billing_agent', ['billing', 'payments']));
    registry.register(makeDescriptor('support_agent', ['support']));
    registry.register(makeDescriptor('insurance_agent', ['insurance']));
  }

  const dispatcher = new ScriptedDispatcher();
  const router = new MessageRouter({
    directory: registry,
    dispatcher,
    classifier: options.classifier ?? new KeywordTopicClassifier(routing),
    localHandler: new StaticLocalHandler(routing),
    routing,
    logger: silentLogger,
  });

  return { registry, dispatcher, router };
}

describe('MessageRouter.route', () => {
  describe('explicit delegation', () => {
    it('hands the task text to the named agent', async () => {
      const { dispatcher, router } = setup();

      const outcome = await router.route('ask the billing_agent to refund order 42', { correlationId: 'corr-1' });

      expect(outcome).toEqual({
        kind: 'delegated',
        reply: 'billing_agent:refund order 42',
        via: 'explicit',
        correlationId: 'corr-1',
        agent: 'billing_agent',
      });
      expect(dispatcher.calls[0].options).toEqual({ correlationId: 'corr-1' });
    });

    it('resolves "<name> agent" to the registered name', async () => {
      const { dispatcher, router } = setup();

      const outcome = await router.route('talk to the Support agent about ticket 7');

      expect(outcome.agent).toBe('support_agent');
      expect(dispatcher.calls[0].taskText).toBe('ticket 7');
    });

    it('takes precedence over topic keywords', async () => {
      const { dispatcher, router } = setup();

      await router.route('ask the support_agent about my invoice');

      expect(dispatcher.calledAgents()).toEqual(['support_agent']);
    });

    it('answers with the known agents when the name does not resolve', async () => {
      const { dispatcher, router } = setup();

      const outcome = await router.route('ask the payroll agent to pay me', { correlationId: 'corr-2' });

      expect(outcome).toEqual({
        kind: 'agent_not_found',
        reply: "❌ Agent 'payroll agent' not found. Known agents: billing_agent, support_agent, insurance_agent.",
        via: 'explicit',
        correlationId: 'corr-2',
        knownAgents: ['billing_agent', 'support_agent', 'insurance_agent'],
      });
      expect(dispatcher.calls).toHaveLength(0);
    });

    it('says when no agents are registered', async () => {
      const { router } = setup({ agents: false });

      const outcome = await router.route('consult billing_agent about refunds');

      expect(outcome.reply).toBe("❌ Agent 'billing_agent' not found. No agents are registered.");
      expect(outcome.knownAgents).toEqual([]);
    });
  });

  describe('topic routing', () => {
    it('sends capability topics to the first matching agent', async () => {
      const { dispatcher, router } = setup();

      const outcome = await router.route('Where is my invoice?', { correlationId: 'corr-3', timeoutMs: 2_000 });

      expect(outcome).toEqual({
        kind: 'delegated',
        reply: 'billing_agent:Where is my invoice?',
        via: 'topic',
        correlationId: 'corr-3',
        agent: 'billing_agent',
        topic: 'payments',
        confidence: 0.75,
      });
      expect(dispatcher.calls[0].options).toEqual({ correlationId: 'corr-3', timeoutMs: 2_000 });
    });

    it('sends agent-routed topics to the named agent', async () => {
      const { router } = setup();

      const outcome = await router.route('I need an insurance quote');

      expect(outcome).toMatchObject({ kind: 'delegated', agent: 'insurance_agent', topic: 'insurance', confidence: 1 });
    });

    it('handles local topics with the configured reply', async () => {
      const { dispatcher, router } = setup();

      const outcome = await router.route('hello', { correlationId: 'corr-4' });

      expect(outcome).toEqual({
        kind: 'local',
        reply: GREETING,
        via: 'topic',
        correlationId: 'corr-4',
        topic: 'general',
        confidence: 0.75,
      });
      expect(dispatcher.calls).toHaveLength(0);
    });

    it('falls through to local handling when nothing matches', async () => {
      const { dispatcher, router } = setup();

      const outcome = await router.route('tell me a joke');

      expect(outcome).toMatchObject({ kind: 'local', reply: routing.fallbackReply, topic: 'unknown', confidence: 0 });
      expect(dispatcher.calls).toHaveLength(0);
    });

    it('handles remote topics locally when no agent serves them', async () => {
      const { dispatcher, router } = setup();

      const outcome = await router.route('what is the weather tomorrow');

      expect(outcome).toMatchObject({ kind: 'local', reply: routing.fallbackReply, topic: 'weather' });
      expect(dispatcher.calls).toHaveLength(0);
    });

    it('stays local below the confidence threshold', async () => {
      const { dispatcher, router } = setup({
        classifier: { classify: () => ({ label: 'payments', confidence: 0.3 }) },
      });

      const outcome = await router.route('maybe money?');

      expect(outcome).toMatchObject({ kind: 'local', reply: routing.fallbackReply, topic: 'payments', confidence: 0.3 });
      expect(dispatcher.calls).toHaveLength(0);
    });

    it('treats a failing classifier as an unknown topic', async () => {
      const { router } = setup({
        classifier: {
          classify: () => {
            throw new Error('model offline');
          },
        },
      });

      const outcome = await router.route('Where is my invoice?');

      expect(outcome).toMatchObject({ kind: 'local', topic: 'unknown', confidence: 0 });
    });
  });

  describe('remote failures', () => {
    it('labels rate limiting as busy', async () => {
      const { dispatcher, router } = setup();
      dispatcher.fail('billing_agent', new RateLimitExceededError('billing_agent', 60, 0, null));

      const outcome = await router.route('ask the billing_agent to refund order 42');

      expect(outcome.kind).toBe('rate_limited');
      expect(outcome.reply).toBe(
        '⚠ agent busy: billing_agent is handling too many requests. Please try again shortly.',
      );
    });

    const unavailable: Array<[string, Error]> = [
      ['an open circuit', new CircuitOpenError('billing_agent', new Date(0))],
      ['exhausted retries', new CommunicationError('timeout', 'no answer', 'http://agents.test/billing_agent', 4)],
    ];

    it.each(unavailable)('labels %s as unavailable', async (_label, error) => {
      const { dispatcher, router } = setup();
      dispatcher.fail('billing_agent', error);

      const outcome = await router.route('Where is my invoice?');

      expect(outcome).toMatchObject({
        kind: 'unavailable',
        reply: '⚠ agent unavailable: billing_agent cannot be reached right now. Please try again later.',
        agent: 'billing_agent',
        topic: 'payments',
      });
    });

    it('rethrows unexpected errors', async () => {
      const { dispatcher, router } = setup();
      dispatcher.fail('billing_agent', new TypeError('bug'));

      await expect(router.route('ask the billing_agent to refund')).rejects.toThrow('bug');
    });
  });

  it('generates a correlation id when none is given', async () => {
    const { dispatcher, router } = setup();

    const outcome = await router.route('ask the billing_agent to refund order 42');

    expect(outcome.correlationId).toMatch(/^[0-9a-f-]{36}$/);
    expect(dispatcher.calls[0].options.correlationId).toBe(outcome.correlationId);
  });
});
