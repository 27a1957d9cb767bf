import type { Position } from './types.js';

/**
 * Place nodes evenly on the unit circle, node 0 at angle 0, counter-clockwise.
 */
export function circularLayout(numNodes: number): Position[] {
  const positions: Position[] = [];
  for (let i = 0; i < numNodes; i++) {
    const angle = (2 * Math.PI * i) / numNodes;
    positions.push({ x: Math.cos(angle), y: Math.sin(angle) });
  }
  return positions;
}
