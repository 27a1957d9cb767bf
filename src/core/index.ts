/**
 * Rank-flow core: edge decay, teleportation distribution and the
 * mass-conserving rank iteration. Pure functions only.
 */

export type {
  NodeId,
  Edge,
  Graph,
  WeightVector,
  TeleportVector,
  RankVector,
} from './types.js';
export { SUM_TOLERANCE } from './types.js';

export { BASE_EDGE_WEIGHT, exponentialWeight, currentWeight, decayedWeights } from './edge-decay.js';

export { buildTeleportVector } from './teleport.js';

export { createGraph, validateGraph, computeStaticOutDegree } from './graph.js';

export { RankFlowEngine, runRankFlow } from './rank-flow.js';
