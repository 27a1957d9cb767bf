/**
 * Exponential decay of edge strength over discrete time.
 *
 * Every edge is born with unit strength at its creation time and decays as
 * w(t) = w₀ · e^(-k·(t - t₀)). Before its creation time an edge does not
 * exist and has zero weight.
 */

import type { Edge, WeightVector } from './types.js';

/** Strength assigned to every edge at creation. */
export const BASE_EDGE_WEIGHT = 1.0;

/**
 * Calculate weight for exponential decay.
 */
export function exponentialWeight(
  initialWeight: number,
  decayConstant: number,
  elapsed: number,
): number {
  return initialWeight * Math.exp(-elapsed * decayConstant);
}

/**
 * Current weight of an edge at `queryTime`.
 *
 * A negative `decayConstant` is not rejected; the weight then grows with
 * elapsed time.
 *
 * @returns 0 before the edge exists, otherwise the decayed strength
 */
export function currentWeight(edge: Edge, queryTime: number, decayConstant: number): number {
  if (queryTime < edge.creationTime) {
    return 0;
  }
  return exponentialWeight(BASE_EDGE_WEIGHT, decayConstant, queryTime - edge.creationTime);
}

/**
 * Weights of every edge at `queryTime`, aligned with `edges`.
 */
export function decayedWeights(
  edges: readonly Edge[],
  queryTime: number,
  decayConstant: number,
): WeightVector {
  return edges.map((edge) => currentWeight(edge, queryTime, decayConstant));
}
