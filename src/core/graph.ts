/**
 * Graph construction and validation.
 */

import { InvalidInputError } from '../utils/errors.js';
import type { Edge, Graph } from './types.js';

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Check the structural preconditions of a graph: a positive integer node
 * count, endpoints inside [0, numNodes) and non-negative integer creation
 * times.
 *
 * @throws InvalidInputError on the first violation found
 */
export function validateGraph(graph: Graph): void {
  const { numNodes, edges } = graph;

  if (!Number.isInteger(numNodes) || numNodes <= 0) {
    throw new InvalidInputError(
      `numNodes must be a positive integer, got ${numNodes}`,
      'INVALID_NODE_COUNT',
    );
  }

  edges.forEach((edge, index) => {
    for (const endpoint of [edge.source, edge.target]) {
      if (!isNonNegativeInteger(endpoint) || endpoint >= numNodes) {
        throw new InvalidInputError(
          `Edge ${index} (${edge.source} -> ${edge.target}) has an endpoint outside [0, ${numNodes})`,
          'EDGE_OUT_OF_BOUNDS',
        );
      }
    }
    if (!isNonNegativeInteger(edge.creationTime)) {
      throw new InvalidInputError(
        `Edge ${index} has invalid creation time ${edge.creationTime}`,
        'INVALID_CREATION_TIME',
      );
    }
  });
}

/**
 * Build a validated, frozen graph. Edges are copied so later changes to the
 * caller's objects cannot reach the graph.
 */
export function createGraph(numNodes: number, edges: readonly Edge[]): Graph {
  const graph: Graph = {
    numNodes,
    edges: Object.freeze(
      edges.map((e) =>
        Object.freeze({ source: e.source, target: e.target, creationTime: e.creationTime }),
      ),
    ),
  };
  validateGraph(graph);
  return Object.freeze(graph);
}

/**
 * Number of outgoing edges per node, ignoring weights and decay.
 */
export function computeStaticOutDegree(graph: Graph): number[] {
  const degree = new Array<number>(graph.numNodes).fill(0);
  for (const edge of graph.edges) {
    degree[edge.source] += 1;
  }
  return degree;
}
