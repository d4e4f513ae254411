/**
 * Unit Tests: scenario request shapes, weighted selection, webhook signing.
 */
import { createHmac } from 'crypto';
import { describe, it, expect } from 'vitest';
import {
  allScenarios,
  getScenario,
  graphqlScenario,
  healthScenario,
  mixedScenario,
  restCrudScenario,
} from '../../src/scenarios/index.js';
import { GRAPHQL_QUERIES } from '../../src/scenarios/graphql.js';
import { signWebhook, webhookStep } from '../../src/scenarios/mixed.js';
import { benchEmail, extractToken } from '../../src/scenarios/rest-crud.js';
import { VirtualUserSession, pickWeighted } from '../../src/scenarios/scenario.js';

function session(overrides: Partial<VirtualUserSession> = {}): VirtualUserSession {
  return { workerId: 2, runId: 'run1', iteration: 0, ...overrides };
}

const context = (value: number) => ({ webhookSecret: 'test-secret', random: () => value });

describe('pickWeighted', () => {
  const entries = [
    { weight: 0.3, item: 'a' },
    { weight: 0.4, item: 'b' },
    { weight: 0.3, item: 'c' },
  ];

  it('maps the random draw onto cumulative weights', () => {
    expect(pickWeighted(entries, () => 0)).toBe('a');
    expect(pickWeighted(entries, () => 0.35)).toBe('b');
    expect(pickWeighted(entries, () => 0.8)).toBe('c');
    expect(pickWeighted(entries, () => 0.9999)).toBe('c');
  });

  it('rejects an empty list', () => {
    expect(() => pickWeighted([], () => 0.5)).toThrow('Cannot pick from an empty weighted list');
  });
});

describe('scenario registry', () => {
  it('has one scenario per kind', () => {
    expect(Object.keys(allScenarios)).toEqual(['health', 'rest', 'graphql', 'mixed']);
    expect(getScenario('rest')).toBe(restCrudScenario);
  });

  it('titles scenarios for reports', () => {
    expect(healthScenario.title).toBe('Health Check');
    expect(restCrudScenario.title).toBe('REST API');
    expect(graphqlScenario.title).toBe('GraphQL');
    expect(mixedScenario.title).toBe('Mixed Load');
  });
});

describe('health scenario', () => {
  it('issues a single GET /health per pass', () => {
    const steps = healthScenario.nextPass(session(), context(0));
    expect(steps).toHaveLength(1);
    expect(steps[0].build(session())).toEqual({ method: 'GET', path: '/health', expect: 'json' });
  });
});

describe('REST scenario', () => {
  it('runs the auth and product sequence in order', () => {
    const tags = restCrudScenario.nextPass(session(), context(0)).map(s => s.tag);
    expect(tags).toEqual([
      'POST /api/auth/register',
      'POST /api/auth/login',
      'GET /api/users/me',
      'GET /api/products',
      'POST /api/products',
    ]);
  });

  it('registers a unique user per worker and pass', () => {
    const [register] = restCrudScenario.nextPass(session(), context(0));
    const request = register.build(session({ iteration: 4 }));

    expect(benchEmail(session({ iteration: 4 }))).toBe('bench-run1-2-4@example.com');
    expect(request.method).toBe('POST');
    expect(request.headers).toEqual({ 'Content-Type': 'application/json' });
    expect(JSON.parse(request.body ?? '')).toEqual({
      email: 'bench-run1-2-4@example.com',
      name: 'Bench User 2',
      password: 'BenchmarkPass123!',
    });
  });

  it('captures the token and sends it on the profile request', () => {
    const vu = session();
    const [register, , me] = restCrudScenario.nextPass(vu, context(0));

    expect(me.build(vu).headers).toEqual({});
    register.capture?.({ success: true, data: { token: 'test-token' } }, vu);
    expect(vu.token).toBe('test-token');
    expect(me.build(vu).headers).toEqual({ Authorization: 'Bearer test-token' });
  });

  it('drops the previous user\'s token at the start of each pass', () => {
    const vu = session({ token: 'stale-token', iteration: 1 });
    const [, , me] = restCrudScenario.nextPass(vu, context(0));

    expect(vu.token).toBeUndefined();
    expect(me.build(vu).headers).toEqual({});
  });

  it('extracts tokens only from well-formed envelopes', () => {
    expect(extractToken({ data: { token: 'abc' } })).toBe('abc');
    expect(extractToken({ data: { token: 42 } })).toBeUndefined();
    expect(extractToken({ data: null })).toBeUndefined();
    expect(extractToken('abc')).toBeUndefined();
  });

  it('posts a product body', () => {
    const steps = restCrudScenario.nextPass(session(), context(0));
    const request = steps[4].build(session());
    expect(JSON.parse(request.body ?? '')).toEqual({
      name: 'Benchmark Product',
      description: 'Created during benchmark',
      price: 99.99,
    });
  });
});

describe('GraphQL scenario', () => {
  it('weights health, products and users 30/40/30', () => {
    expect(GRAPHQL_QUERIES.map(q => [q.item.tag, q.weight])).toEqual([
      ['POST /graphql health', 0.3],
      ['POST /graphql products', 0.4],
      ['POST /graphql users', 0.3],
    ]);
  });

  it('posts one query per pass and expects a GraphQL envelope', () => {
    const [step] = graphqlScenario.nextPass(session(), context(0.5));
    const request = step.build(session());

    expect(step.tag).toBe('POST /graphql products');
    expect(request.path).toBe('/graphql');
    expect(request.expect).toBe('graphql');
    expect(JSON.parse(request.body ?? '')).toEqual({ query: 'query { products { id name price } }' });
  });
});

describe('mixed scenario', () => {
  it('picks from health, products, GraphQL, metrics and webhooks', () => {
    const tagFor = (value: number) => mixedScenario.nextPass(session(), context(value))[0].tag;

    expect(tagFor(0)).toBe('GET /health');
    expect(tagFor(0.3)).toBe('GET /api/products');
    expect(tagFor(0.6)).toBe('POST /graphql products');
    expect(tagFor(0.75)).toBe('GET /metrics');
    expect(tagFor(0.95)).toBe('POST /webhooks/shopify');
  });
});

describe('webhook signing', () => {
  it('signs the exact body it sends', () => {
    const request = webhookStep('test-secret').build(session({ iteration: 7 }));
    const body = request.body ?? '';
    const expected = createHmac('sha256', 'test-secret').update(body, 'utf8').digest('base64');

    expect(request.headers?.['X-Shopify-Hmac-Sha256']).toBe(expected);
    expect(request.headers?.['X-Shopify-Topic']).toBe('orders/create');
    expect(JSON.parse(body).id).toBe(2_000_007);
  });

  it('produces a base64 SHA-256 digest', () => {
    expect(signWebhook('{}', 'test-secret')).toMatch(/^[A-Za-z0-9+/]{43}=$/);
  });

  it('depends on the secret', () => {
    expect(signWebhook('{}', 'test-secret')).not.toBe(signWebhook('{}', 'other-secret'));
  });
});
