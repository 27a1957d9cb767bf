/**
 * Shared types for the rank-flow core.
 *
 * Nodes carry no identity beyond a dense index in [0, numNodes); every
 * per-node and per-edge quantity is a plain array indexed positionally.
 */

/** Dense node index in [0, numNodes). */
export type NodeId = number;

/**
 * A directed edge stamped with the discrete time it was created.
 */
export interface Edge {
  readonly source: NodeId;
  readonly target: NodeId;
  /** Discrete creation time (integer ≥ 0) */
  readonly creationTime: number;
}

/**
 * An ordered edge list over `numNodes` nodes. Parallel edges and
 * self-loops are allowed.
 */
export interface Graph {
  readonly numNodes: number;
  readonly edges: readonly Edge[];
}

/** One decayed weight per edge, aligned with `Graph.edges`. */
export type WeightVector = readonly number[];

/** Restart probability per node; sums to 1. */
export type TeleportVector = readonly number[];

/** Rank mass per node; sums to 1. */
export type RankVector = number[];

/** Tolerance used when checking that a distribution sums to 1. */
export const SUM_TOLERANCE = 1e-9;
