import type { HttpRequest } from '../http-client.js';
import { JSON_HEADERS, RequestStep, Scenario, VirtualUserSession } from './scenario.js';

export const BENCH_PASSWORD = 'BenchmarkPass123!';

export function benchEmail(session: VirtualUserSession): string {
  return `bench-${session.runId}-${session.workerId}-${session.iteration}@example.com`;
}

/** Pulls `data.token` out of an auth response envelope. */
export function extractToken(payload: unknown): string | undefined {
  if (typeof payload !== 'object' || payload === null || !('data' in payload)) {
    return undefined;
  }
  const { data } = payload;
  if (typeof data !== 'object' || data === null || !('token' in data)) {
    return undefined;
  }
  return typeof data.token === 'string' ? data.token : undefined;
}

function captureToken(payload: unknown, session: VirtualUserSession): void {
  const token = extractToken(payload);
  if (token) {
    session.token = token;
  }
}

const registerStep: RequestStep = {
  tag: 'POST /api/auth/register',
  build: session => ({
    method: 'POST',
    path: '/api/auth/register',
    headers: { ...JSON_HEADERS },
    body: JSON.stringify({
      email: benchEmail(session),
      name: `Bench User ${session.workerId}`,
      password: BENCH_PASSWORD,
    }),
    expect: 'json',
  }),
  capture: captureToken,
};

const loginStep: RequestStep = {
  tag: 'POST /api/auth/login',
  build: session => ({
    method: 'POST',
    path: '/api/auth/login',
    headers: { ...JSON_HEADERS },
    body: JSON.stringify({ email: benchEmail(session), password: BENCH_PASSWORD }),
    expect: 'json',
  }),
  capture: captureToken,
};

const currentUserStep: RequestStep = {
  tag: 'GET /api/users/me',
  build: (session): HttpRequest => ({
    method: 'GET',
    path: '/api/users/me',
    headers: session.token ? { Authorization: `Bearer ${session.token}` } : {},
    expect: 'json',
  }),
};

export const listProductsStep: RequestStep = {
  tag: 'GET /api/products',
  build: () => ({ method: 'GET', path: '/api/products', expect: 'json' }),
};

const createProductStep: RequestStep = {
  tag: 'POST /api/products',
  build: () => ({
    method: 'POST',
    path: '/api/products',
    headers: { ...JSON_HEADERS },
    body: JSON.stringify({
      name: 'Benchmark Product',
      description: 'Created during benchmark',
      price: 99.99,
    }),
    expect: 'json',
  }),
};

export const restCrudScenario: Scenario = {
  kind: 'rest',
  title: 'REST API',
  description: 'register, login, fetch profile, list and create products',
  nextPass: session => {
    // Each pass registers a fresh user; the previous user's token must not leak into it.
    session.token = undefined;
    return [registerStep, loginStep, currentUserStep, listProductsStep, createProductStep];
  },
};
