import { createHmac } from 'crypto';
import { graphqlStep } from './graphql.js';
import { healthStep } from './health.js';
import { listProductsStep } from './rest-crud.js';
import { JSON_HEADERS, RequestStep, Scenario, ScenarioContext, Weighted, pickWeighted } from './scenario.js';

/** Base64 HMAC-SHA256 of the raw body, as carried in X-Shopify-Hmac-Sha256. */
export function signWebhook(body: string, secret: string): string {
  return createHmac('sha256', secret).update(body, 'utf8').digest('base64');
}

export function webhookStep(secret: string): RequestStep {
  return {
    tag: 'POST /webhooks/shopify',
    build: session => {
      const body = JSON.stringify({
        id: session.workerId * 1_000_000 + session.iteration,
        email: `bench-${session.workerId}@example.com`,
        total_price: '99.99',
        currency: 'USD',
      });
      return {
        method: 'POST',
        path: '/webhooks/shopify',
        headers: {
          ...JSON_HEADERS,
          'X-Shopify-Topic': 'orders/create',
          'X-Shopify-Hmac-Sha256': signWebhook(body, secret),
        },
        body,
        expect: 'json',
      };
    },
  };
}

const metricsStep: RequestStep = {
  tag: 'GET /metrics',
  build: () => ({ method: 'GET', path: '/metrics', expect: 'json' }),
};

const graphqlProductsStep = graphqlStep('products', 'query { products { id name } }');

export function mixedSteps(ctx: ScenarioContext): Weighted<RequestStep>[] {
  return [
    { weight: 0.2, item: healthStep },
    { weight: 0.25, item: listProductsStep },
    { weight: 0.25, item: graphqlProductsStep },
    { weight: 0.15, item: metricsStep },
    { weight: 0.15, item: webhookStep(ctx.webhookSecret) },
  ];
}

export const mixedScenario: Scenario = {
  kind: 'mixed',
  title: 'Mixed Load',
  description: 'health, REST, GraphQL, metrics and signed webhook traffic',
  nextPass: (_session, ctx) => [pickWeighted(mixedSteps(ctx), ctx.random)],
};
