// tests/scenarios/delegation.scenario.test.ts

/**
 * End-to-end scenario: the real composition root, the real axios transport
 * and an in-process mock agent server.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';

import { createApp } from '../../src/app';
import { buildRuntimeDeps, type RuntimeDeps } from '../../src/bootstrap/buildDeps';
import { loadConfig } from '../../src/shared/config/Config';
import { silentLogger } from '../helpers/fakes';
import { startMockAgentServer, type MockAgentServer } from '../helpers/mockAgentServer';

describe('Delegation scenario', () => {
  let agents: MockAgentServer;
  let deps: RuntimeDeps;
  let app: ReturnType<typeof createApp>;
  let dir: string;

  beforeAll(async () => {
    agents = await startMockAgentServer();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'delegation-scenario-'));

    const agentsFile = path.join(dir, 'agents.json');
    fs.writeFileSync(
      agentsFile,
      JSON.stringify({
        agents: [
          { name: 'echo_agent', endpoint: `${agents.url}/echo`, capabilities: ['billing'] },
          {
            name: 'broken_agent',
            endpoint: `${agents.url}/broken`,
            capabilities: ['billing'],
            metadata: { failureThreshold: 1 },
          },
          { name: 'down_agent', endpoint: `${agents.url}/down`, capabilities: ['support'] },
          { name: 'picky_agent', endpoint: `${agents.url}/remote-error` },
        ],
      }),
      'utf8',
    );

    const config = loadConfig({
      NODE_ENV: 'test',
      AGENTS_CONFIG_PATH: agentsFile,
      AGENTS_FROM_ENV: 'false',
      ROUTING_CONFIG_PATH: path.join(__dirname, '..', '..', 'config', 'routing.json'),
      SHUTDOWN_GRACE_MS: '0',
    });

    deps = buildRuntimeDeps({
      config,
      logger: silentLogger,
      transport: { sleep: async () => undefined },
    });
    app = createApp(deps);
  });

  afterAll(async () => {
    await deps.shutdown();
    await agents.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads the agent file into the registry', () => {
    expect(deps.registry.list().map((a) => a.name)).toEqual([
      'echo_agent',
      'broken_agent',
      'down_agent',
      'picky_agent',
    ]);
  });

  it('delegates an explicit request and forwards the correlation id', async () => {
    const res = await request(app)
      .post('/v1/messages')
      .set('x-correlation-id', 'corr-s1')
      .send({ text: 'ask the echo_agent to refund order 42' })
      .expect(200);

    expect(res.body).toEqual({
      kind: 'delegated',
      reply: 'echo: refund order 42',
      via: 'explicit',
      correlationId: 'corr-s1',
      agent: 'echo_agent',
    });

    const call = agents.calls[agents.calls.length - 1];
    expect(call.path).toBe('/echo');
    expect(call.correlationHeader).toBe('corr-s1');
    expect(call.body).toEqual({
      jsonrpc: '2.0',
      method: 'task.delegate',
      params: { task_text: 'refund order 42', correlation_id: 'corr-s1' },
      id: expect.any(Number),
    });
  });

  it('routes a topic to the first agent with the capability', async () => {
    const res = await request(app).post('/v1/messages').send({ text: 'Where is my invoice?' }).expect(200);

    expect(res.body).toMatchObject({ kind: 'delegated', agent: 'echo_agent', topic: 'payments' });
    expect(res.body.reply).toBe('echo: Where is my invoice?');
  });

  it('does not retry an error reported by the agent', async () => {
    const res = await request(app).post('/v1/messages').send({ text: 'ask the picky_agent to do it' }).expect(200);

    expect(res.body.kind).toBe('unavailable');
    expect(agents.hits('/remote-error')).toBe(1);
  });

  it('retries a 503 agent before reporting it unavailable', async () => {
    const res = await request(app).post('/v1/messages').send({ text: 'ask the down_agent to help' }).expect(200);

    expect(res.body).toMatchObject({ kind: 'unavailable', agent: 'down_agent' });
    expect(agents.hits('/down')).toBe(4);
  });

  it('falls back past a broken agent', async () => {
    const res = await request(app)
      .post('/v1/workflows/fallback')
      .send({ task: 'quote', agents: ['broken_agent', 'echo_agent'] })
      .expect(200);

    expect(res.body.agent).toBe('echo_agent');
    expect(res.body.result).toBe('echo: quote');
    expect(res.body.attempts).toHaveLength(1);
    expect(res.body.attempts[0]).toMatchObject({ agent: 'broken_agent', code: 'AGENT_COMMUNICATION_ERROR' });
  });

  it('keeps the broken agent behind an open circuit', async () => {
    const before = agents.hits('/broken');

    const res = await request(app)
      .post('/v1/workflows/sequential')
      .send({
        steps: [
          { agent: 'echo_agent', task: 'A' },
          { agent: 'broken_agent', task: 'B', dependsOn: [0] },
        ],
      })
      .expect(207);

    expect(res.body.error.details.steps[1].error.code).toBe('CIRCUIT_OPEN');
    expect(agents.hits('/broken')).toBe(before);

    const resilience = await request(app).get('/v1/resilience').expect(200);
    const broken = resilience.body.circuits.find((c: { name: string }) => c.name === 'broken_agent');
    expect(broken.state).toBe('open');
    expect(resilience.body.transport.clients).toBe(4);
  });

  it('health-checks an agent through the pool', async () => {
    const up = await request(app).get('/v1/agents/echo_agent/health').expect(200);
    expect(up.body).toEqual({ agent: 'echo_agent', endpoint: `${agents.url}/echo`, healthy: true });

    const down = await request(app).get('/v1/agents/down_agent/health').expect(200);
    expect(down.body.healthy).toBe(false);
  });

  it('lets operators open and reset a circuit by agent name', async () => {
    const opened = await request(app).post('/v1/resilience/circuits/ECHO_AGENT/open').expect(200);
    expect(opened.body).toMatchObject({ name: 'echo_agent', state: 'open' });

    const blocked = await request(app).post('/v1/messages').send({ text: 'ask the echo_agent to ping' }).expect(200);
    expect(blocked.body.kind).toBe('unavailable');

    const reset = await request(app).post('/v1/resilience/circuits/echo_agent/reset').expect(200);
    expect(reset.body).toMatchObject({ name: 'echo_agent', state: 'closed', consecutiveFailures: 0 });

    const served = await request(app).post('/v1/messages').send({ text: 'ask the echo_agent to ping' }).expect(200);
    expect(served.body.reply).toBe('echo: ping');

    await request(app).post('/v1/resilience/circuits/ghost/reset').expect(404);
  });

  it('refuses new delegations once the pool is shut down', async () => {
    await deps.shutdown();

    const res = await request(app).post('/v1/messages').send({ text: 'ask the echo_agent to ping' }).expect(200);
    expect(res.body.kind).toBe('unavailable');
    expect(deps.pool.size).toBe(0);
  });
});
