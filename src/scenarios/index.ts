import { ScenarioKind } from '../types.js';
import { graphqlScenario } from './graphql.js';
import { healthScenario } from './health.js';
import { mixedScenario } from './mixed.js';
import { restCrudScenario } from './rest-crud.js';
import { Scenario } from './scenario.js';

export const allScenarios: Record<ScenarioKind, Scenario> = {
  health: healthScenario,
  rest: restCrudScenario,
  graphql: graphqlScenario,
  mixed: mixedScenario,
};

export function getScenario(kind: ScenarioKind): Scenario {
  return allScenarios[kind];
}

export { healthScenario, restCrudScenario, graphqlScenario, mixedScenario };
export type { Scenario, ScenarioContext, RequestStep, VirtualUserSession } from './scenario.js';
