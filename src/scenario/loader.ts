/**
 * Scenario files.
 *
 * A scenario file is JSON of the form:
 *
 * ```json
 * {
 *   "name": "triangle",
 *   "numNodes": 3,
 *   "experts": [0],
 *   "edges": [{ "source": 0, "target": 1, "creationTime": 0 }]
 * }
 * ```
 */

import { readFileSync } from 'node:fs';
import { InvalidInputError, ScenarioError } from '../utils/errors.js';
import { validateGraph } from '../core/graph.js';
import type { Edge } from '../core/types.js';
import type { Scenario } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string): InvalidInputError {
  return new InvalidInputError(message, 'INVALID_SCENARIO');
}

function readInteger(source: Record<string, unknown>, key: string, context: string): number {
  const value = source[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw invalid(`${context}.${key} must be an integer`);
  }
  return value;
}

function parseEdge(value: unknown, index: number): Edge {
  const context = `edges[${index}]`;
  if (!isRecord(value)) {
    throw invalid(`${context} must be an object`);
  }
  return {
    source: readInteger(value, 'source', context),
    target: readInteger(value, 'target', context),
    creationTime: readInteger(value, 'creationTime', context),
  };
}

/**
 * Validate an already-parsed JSON document as a scenario.
 *
 * @throws InvalidInputError with code INVALID_SCENARIO for structural
 *   problems, or the graph's own codes for out-of-range values
 */
export function parseScenario(value: unknown): Scenario {
  if (!isRecord(value)) {
    throw invalid('Scenario must be a JSON object');
  }

  const { name, experts, edges } = value;
  if (typeof name !== 'string' || name.length === 0) {
    throw invalid('scenario.name must be a non-empty string');
  }
  const numNodes = readInteger(value, 'numNodes', 'scenario');

  if (!Array.isArray(experts)) {
    throw invalid('scenario.experts must be an array');
  }
  const expertIds = experts.map((expert, i) => {
    if (typeof expert !== 'number' || !Number.isInteger(expert)) {
      throw invalid(`experts[${i}] must be an integer`);
    }
    return expert;
  });

  if (!Array.isArray(edges)) {
    throw invalid('scenario.edges must be an array');
  }
  const parsedEdges = edges.map(parseEdge);

  validateGraph({ numNodes, edges: parsedEdges });

  return { name, numNodes, experts: expertIds, edges: parsedEdges };
}

/**
 * Read and parse a scenario file.
 *
 * @throws ScenarioError (SCENARIO_READ_FAILED) if the file cannot be read or
 *   is not JSON
 */
export function loadScenarioFile(path: string): Scenario {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ScenarioError(`Failed to read scenario file ${path}`, 'SCENARIO_READ_FAILED', error);
  }
  return parseScenario(document);
}
