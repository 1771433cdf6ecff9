// tests/http/agents.endpoint.test.ts

import request from 'supertest';

import { createApp } from '../../src/app';
import { AgentRegistry } from '../../src/delegation/application/AgentRegistry';
import { makeDescriptor, silentLogger, unreachableAppDeps } from '../helpers/fakes';

function setup() {
  const registry = new AgentRegistry(silentLogger);
  registry.register(makeDescriptor('billing_agent', ['billing']));
  registry.register(makeDescriptor('support_agent', ['support']));
  return { app: createApp({ ...unreachableAppDeps(), agents: registry }), registry };
}

describe('/v1/agents', () => {
  test('GET lists agents in registration order', async () => {
    const { app } = setup();

    const res = await request(app).get('/v1/agents').expect(200);

    expect(res.body.agents.map((a: { name: string }) => a.name)).toEqual(['billing_agent', 'support_agent']);
  });

  test('GET ?capability= filters by capability', async () => {
    const { app } = setup();

    const res = await request(app).get('/v1/agents').query({ capability: 'support' }).expect(200);

    expect(res.body.agents.map((a: { name: string }) => a.name)).toEqual(['support_agent']);
  });

  test('GET /:name returns the descriptor or 404', async () => {
    const { app } = setup();

    const found = await request(app).get('/v1/agents/billing_agent').expect(200);
    expect(found.body.endpoint).toBe('http://agents.test/billing_agent');

    const missing = await request(app).get('/v1/agents/ghost').set('x-correlation-id', 'corr-a').expect(404);
    expect(missing.body).toEqual({
      error: { code: 'AGENT_NOT_FOUND', message: 'Agent not found: ghost', correlationId: 'corr-a' },
    });
  });

  test('GET /:name/health reports whether the agent answered its probe', async () => {
    const registry = new AgentRegistry(silentLogger);
    registry.register(makeDescriptor('billing_agent', ['billing']));
    registry.register(makeDescriptor('support_agent', ['support']));
    const checked: string[] = [];
    const app = createApp({
      ...unreachableAppDeps(),
      agents: registry,
      health: {
        checkHealth: async (agent) => {
          checked.push(agent.name);
          return agent.name === 'billing_agent';
        },
      },
    });

    const up = await request(app).get('/v1/agents/BILLING_AGENT/health').expect(200);
    expect(up.body).toEqual({ agent: 'billing_agent', endpoint: 'http://agents.test/billing_agent', healthy: true });

    const down = await request(app).get('/v1/agents/support_agent/health').expect(200);
    expect(down.body.healthy).toBe(false);

    await request(app).get('/v1/agents/ghost/health').expect(404);
    expect(checked).toEqual(['billing_agent', 'support_agent']);
  });

  test('PUT registers (201) and overwrites (200)', async () => {
    const { app, registry } = setup();
    const descriptor = { name: 'weather_agent', endpoint: 'http://localhost:9001', capabilities: ['weather'] };

    const created = await request(app).put('/v1/agents').send(descriptor).expect(201);
    expect(created.body).toEqual({ ...descriptor, description: '', version: '1.0.0', metadata: {} });

    await request(app)
      .put('/v1/agents')
      .send({ ...descriptor, endpoint: 'http://localhost:9009' })
      .expect(200);

    expect(registry.size).toBe(3);
    expect(registry.findByName('weather_agent')?.endpoint).toBe('http://localhost:9009');
  });

  test('PUT rejects invalid descriptors with 400', async () => {
    const { app } = setup();

    const res = await request(app).put('/v1/agents').send({ name: 'x', endpoint: 'nope' }).expect(400);

    expect(res.body.error).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Invalid agent descriptor',
      issues: ['"endpoint" must be an absolute URL.'],
    });
  });

  test('DELETE removes the agent and is idempotent', async () => {
    const { app, registry } = setup();

    await request(app).delete('/v1/agents/billing_agent').expect(204);
    await request(app).delete('/v1/agents/billing_agent').expect(204);

    expect(registry.findByName('billing_agent')).toBeNull();
  });
});
