import { JSON_HEADERS, RequestStep, Scenario, Weighted, pickWeighted } from './scenario.js';

export function graphqlStep(name: string, query: string): RequestStep {
  return {
    tag: `POST /graphql ${name}`,
    build: () => ({
      method: 'POST',
      path: '/graphql',
      headers: { ...JSON_HEADERS },
      body: JSON.stringify({ query }),
      expect: 'graphql',
    }),
  };
}

export const GRAPHQL_QUERIES: readonly Weighted<RequestStep>[] = [
  { weight: 0.3, item: graphqlStep('health', 'query { health }') },
  { weight: 0.4, item: graphqlStep('products', 'query { products { id name price } }') },
  { weight: 0.3, item: graphqlStep('users', 'query { users { id email name } }') },
];

export const graphqlScenario: Scenario = {
  kind: 'graphql',
  title: 'GraphQL',
  description: 'weighted mix of health, products and users queries',
  nextPass: (_session, ctx) => [pickWeighted(GRAPHQL_QUERIES, ctx.random)],
};
