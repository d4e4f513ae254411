import { RequestStep, Scenario } from './scenario.js';

export const healthStep: RequestStep = {
  tag: 'GET /health',
  build: () => ({ method: 'GET', path: '/health', expect: 'json' }),
};

export const healthScenario: Scenario = {
  kind: 'health',
  title: 'Health Check',
  description: 'GET /health in a tight loop',
  nextPass: () => [healthStep],
};
