/**
 * Scenario types.
 */

import type { Edge, NodeId } from '../core/types.js';

/**
 * A named topology with its expert nodes. Edge creation times drive how the
 * graph grows across frames.
 */
export interface Scenario {
  readonly name: string;
  readonly numNodes: number;
  readonly experts: readonly NodeId[];
  readonly edges: readonly Edge[];
}

/** 2D position of a node in layout units. */
export interface Position {
  x: number;
  y: number;
}
