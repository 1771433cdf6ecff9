// tests/http/resilience.endpoint.test.ts

import request from 'supertest';

import { createApp } from '../../src/app';
import { CircuitBreakerRegistry } from '../../src/resilience/application/CircuitBreakerRegistry';
import { SlidingWindowRateLimiter } from '../../src/resilience/application/RateLimiter';
import { silentLogger, unreachableAppDeps } from '../helpers/fakes';

describe('GET /v1/resilience', () => {
  test('reports circuit states and limiter windows', async () => {
    const now = () => 0;
    const breakers = new CircuitBreakerRegistry({ now, logger: silentLogger });
    const limiter = new SlidingWindowRateLimiter({ now });

    breakers.get('billing_agent', { failureThreshold: 3, openTimeoutMs: 30_000 }).forceOpen();
    breakers.get('support_agent');
    limiter.allow('billing_agent', 10);
    limiter.allow('billing_agent', 10);

    const base = unreachableAppDeps();
    const app = createApp({
      ...base,
      resilience: {
        ...base.resilience,
        snapshot: () => ({ circuits: breakers.snapshot(), rateLimiter: limiter.stats(), transport: { clients: 2 } }),
      },
    });

    const res = await request(app).get('/v1/resilience').expect(200);

    expect(res.body).toEqual({
      circuits: [
        {
          name: 'billing_agent',
          state: 'open',
          consecutiveFailures: 0,
          openedAt: '1970-01-01T00:00:00.000Z',
          failureThreshold: 3,
          openTimeoutMs: 30_000,
        },
        {
          name: 'support_agent',
          state: 'closed',
          consecutiveFailures: 0,
          openedAt: null,
          failureThreshold: 5,
          openTimeoutMs: 60_000,
        },
      ],
      rateLimiter: { keys: 1, trackedCalls: 2, windowMs: 60_000 },
      transport: { clients: 2 },
    });
  });
});

describe('POST /v1/resilience/circuits/:name/*', () => {
  test('returns the circuit snapshot after the change', async () => {
    const breakers = new CircuitBreakerRegistry({ now: () => 0, logger: silentLogger });
    const base = unreachableAppDeps();
    const app = createApp({
      ...base,
      resilience: {
        ...base.resilience,
        openCircuit: (name) => {
          const breaker = breakers.get(name);
          breaker.forceOpen();
          return breaker.snapshot();
        },
      },
    });

    const res = await request(app).post('/v1/resilience/circuits/billing_agent/open').expect(200);
    expect(res.body).toMatchObject({ name: 'billing_agent', state: 'open', openedAt: '1970-01-01T00:00:00.000Z' });

    const missing = await request(app)
      .post('/v1/resilience/circuits/ghost/reset')
      .set('x-correlation-id', 'corr-r')
      .expect(404);
    expect(missing.body).toEqual({
      error: { code: 'AGENT_NOT_FOUND', message: 'Agent not found: ghost', correlationId: 'corr-r' },
    });
  });
});
