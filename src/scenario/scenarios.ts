/**
 * Built-in scenarios and scenario resolution.
 */

import { existsSync } from 'node:fs';
import { ScenarioError } from '../utils/errors.js';
import { loadScenarioFile } from './loader.js';
import type { Scenario } from './types.js';

function freezeScenario(scenario: Scenario): Scenario {
  return Object.freeze({
    name: scenario.name,
    numNodes: scenario.numNodes,
    experts: Object.freeze([...scenario.experts]),
    edges: Object.freeze(scenario.edges.map((edge) => Object.freeze({ ...edge }))),
  });
}

/**
 * A chain that grows one edge per time step from the single expert at node
 * 0, closing a loop 5 → 1 at the end. Frozen, since every caller shares it.
 */
export const TRUST_FLOW_EXAMPLE: Scenario = freezeScenario({
  name: 'trust-flow-example',
  numNodes: 6,
  experts: [0],
  edges: [
    { source: 0, target: 1, creationTime: 1 },
    { source: 1, target: 2, creationTime: 2 },
    { source: 1, target: 3, creationTime: 3 },
    { source: 3, target: 4, creationTime: 4 },
    { source: 3, target: 5, creationTime: 5 },
    { source: 5, target: 1, creationTime: 6 },
  ],
});

const BUILT_IN: ReadonlyMap<string, Scenario> = new Map([
  [TRUST_FLOW_EXAMPLE.name, TRUST_FLOW_EXAMPLE],
]);

export function listScenarios(): string[] {
  return [...BUILT_IN.keys()];
}

/**
 * Look up a built-in scenario by name.
 *
 * @throws ScenarioError with code SCENARIO_NOT_FOUND
 */
export function getScenario(name: string): Scenario {
  const scenario = BUILT_IN.get(name);
  if (!scenario) {
    throw new ScenarioError(`Unknown scenario: ${name}`, 'SCENARIO_NOT_FOUND');
  }
  return scenario;
}

/**
 * Resolve a scenario reference: a built-in name first, then a path to a
 * scenario JSON file.
 */
export function resolveScenario(ref: string): Scenario {
  if (BUILT_IN.has(ref)) {
    return getScenario(ref);
  }
  if (existsSync(ref)) {
    return loadScenarioFile(ref);
  }
  throw new ScenarioError(`Unknown scenario: ${ref}`, 'SCENARIO_NOT_FOUND');
}
