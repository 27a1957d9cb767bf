/**
 * Teleportation (restart) distribution biased toward expert nodes.
 */

import { InvalidInputError } from '../utils/errors.js';
import type { NodeId, TeleportVector } from './types.js';

/**
 * Build the restart vector.
 *
 * Every node receives `(1 - expertFraction) / numNodes`; each distinct expert
 * additionally receives `expertFraction / |experts|`. Repeated expert ids
 * count once.
 *
 * @param expertNodes - Expert node ids; duplicates are ignored
 * @param expertFraction - Share of restart mass reserved for experts, in [0, 1]
 * @throws InvalidInputError if expertFraction > 0 with no experts, or on
 *   an invalid node count, fraction or expert id
 */
export function buildTeleportVector(
  numNodes: number,
  expertNodes: Iterable<NodeId>,
  expertFraction: number,
): TeleportVector {
  if (!Number.isInteger(numNodes) || numNodes <= 0) {
    throw new InvalidInputError(
      `numNodes must be a positive integer, got ${numNodes}`,
      'INVALID_NODE_COUNT',
    );
  }
  if (!Number.isFinite(expertFraction) || expertFraction < 0 || expertFraction > 1) {
    throw new InvalidInputError(
      `expertFraction must be within [0, 1], got ${expertFraction}`,
      'INVALID_EXPERT_FRACTION',
    );
  }

  const experts = new Set<NodeId>(expertNodes);
  for (const expert of experts) {
    if (!Number.isInteger(expert) || expert < 0 || expert >= numNodes) {
      throw new InvalidInputError(
        `Expert node ${expert} is outside [0, ${numNodes})`,
        'EXPERT_OUT_OF_BOUNDS',
      );
    }
  }
  if (expertFraction > 0 && experts.size === 0) {
    throw new InvalidInputError(
      `expertFraction ${expertFraction} requires at least one expert node`,
      'EMPTY_EXPERT_SET',
    );
  }

  const teleport = new Array<number>(numNodes).fill((1 - expertFraction) / numNodes);
  if (experts.size > 0) {
    const bonus = expertFraction / experts.size;
    for (const expert of experts) {
      teleport[expert] += bonus;
    }
  }
  return teleport;
}
