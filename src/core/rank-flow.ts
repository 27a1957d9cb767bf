/**
 * Mass-conserving rank flow over a time-decayed graph.
 *
 * A PageRank variant in which rank behaves like mass: each iteration injects
 * `(1 - d)` of it through the teleport vector and routes the remaining `d`
 * along edges in proportion to their decayed weight. Flow is normalized by
 * the node's static out-degree, so capacity lost to decay is not routed
 * along edges; it joins the dangling pool together with the mass of nodes
 * without outgoing edges and is spread uniformly. Total mass stays at 1.
 *
 * Iterations are synchronous: iteration k+1 reads only the rank vector of
 * iteration k. There is no convergence test; the caller picks the count.
 */

import { InvalidInputError } from '../utils/errors.js';
import { computeStaticOutDegree, validateGraph } from './graph.js';
import {
  SUM_TOLERANCE,
  type Graph,
  type RankVector,
  type TeleportVector,
  type WeightVector,
} from './types.js';

/**
 * Runs rank flow over a single graph. The graph is validated and its static
 * out-degrees derived once at construction; `run` can then be called for
 * any number of query times. The engine keeps no rank between calls.
 */
export class RankFlowEngine {
  readonly graph: Graph;
  private readonly staticOutDegree: readonly number[];

  constructor(graph: Graph) {
    validateGraph(graph);
    this.graph = graph;
    this.staticOutDegree = computeStaticOutDegree(graph);
  }

  /** Static out-degree per node. */
  outDegrees(): readonly number[] {
    return this.staticOutDegree;
  }

  /**
   * Iterate the update rule `iterationCount` times from uniform rank.
   *
   * @param weights - Decayed weight per edge, aligned with `graph.edges`
   * @param teleport - Restart distribution, one entry per node, summing to 1
   * @param dampingFactor - Share of mass routed along edges, in [0, 1]
   * @throws InvalidInputError before any iteration if a precondition fails
   */
  run(
    weights: WeightVector,
    teleport: TeleportVector,
    dampingFactor: number,
    iterationCount: number,
  ): RankVector {
    this.checkInputs(weights, teleport, dampingFactor, iterationCount);

    const { numNodes, edges } = this.graph;
    const outDegree = this.staticOutDegree;
    const d = dampingFactor;

    let rank: RankVector = new Array<number>(numNodes).fill(1 / numNodes);

    for (let iteration = 0; iteration < iterationCount; iteration++) {
      // Teleportation inflow
      const next = teleport.map((t) => (1 - d) * t);

      // Flow along edges, normalized by static out-degree
      const decayedOutflow = new Array<number>(numNodes).fill(0);
      edges.forEach((edge, i) => {
        const w = weights[i];
        decayedOutflow[edge.source] += w;
        next[edge.target] += d * rank[edge.source] * (w / outDegree[edge.source]);
      });

      // Mass not routed along edges
      let danglingMass = 0;
      for (let node = 0; node < numNodes; node++) {
        const damped = d * rank[node];
        if (outDegree[node] > 0) {
          const allocated = damped * (decayedOutflow[node] / outDegree[node]);
          danglingMass += damped - allocated;
        } else {
          danglingMass += damped;
        }
      }

      const danglingShare = danglingMass / numNodes;
      for (let node = 0; node < numNodes; node++) {
        next[node] += danglingShare;
      }

      rank = next;
    }

    return rank;
  }

  private checkInputs(
    weights: WeightVector,
    teleport: TeleportVector,
    dampingFactor: number,
    iterationCount: number,
  ): void {
    const { numNodes, edges } = this.graph;

    if (weights.length !== edges.length) {
      throw new InvalidInputError(
        `Expected ${edges.length} weights, got ${weights.length}`,
        'WEIGHT_LENGTH_MISMATCH',
      );
    }
    weights.forEach((w, i) => {
      if (!Number.isFinite(w) || w < 0) {
        throw new InvalidInputError(`Weight ${i} is invalid: ${w}`, 'INVALID_WEIGHT');
      }
    });

    if (teleport.length !== numNodes) {
      throw new InvalidInputError(
        `Expected ${numNodes} teleport entries, got ${teleport.length}`,
        'TELEPORT_LENGTH_MISMATCH',
      );
    }
    let teleportSum = 0;
    teleport.forEach((t, i) => {
      if (!Number.isFinite(t) || t < 0) {
        throw new InvalidInputError(`Teleport entry ${i} is invalid: ${t}`, 'INVALID_TELEPORT_ENTRY');
      }
      teleportSum += t;
    });
    if (Math.abs(teleportSum - 1) > SUM_TOLERANCE) {
      throw new InvalidInputError(
        `Teleport vector must sum to 1, got ${teleportSum}`,
        'TELEPORT_NOT_NORMALIZED',
      );
    }

    if (!(dampingFactor >= 0 && dampingFactor <= 1)) {
      throw new InvalidInputError(
        `dampingFactor must be within [0, 1], got ${dampingFactor}`,
        'DAMPING_OUT_OF_RANGE',
      );
    }

    if (!Number.isInteger(iterationCount) || iterationCount < 0) {
      throw new InvalidInputError(
        `iterationCount must be a non-negative integer, got ${iterationCount}`,
        'INVALID_ITERATION_COUNT',
      );
    }
  }
}

/**
 * One-shot rank flow: validate, then iterate from uniform rank.
 */
export function runRankFlow(
  graph: Graph,
  weights: WeightVector,
  teleport: TeleportVector,
  dampingFactor: number,
  iterationCount: number,
): RankVector {
  return new RankFlowEngine(graph).run(weights, teleport, dampingFactor, iterationCount);
}
