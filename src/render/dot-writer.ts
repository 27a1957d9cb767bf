/**
 * Graphviz DOT output for a single frame.
 *
 * Nodes are pinned at fixed positions (neato) and shaded from white to blue
 * by rank; expert nodes get a thick dark green border. Edge width follows
 * the decayed weight, and edges that do not exist yet are drawn invisible
 * so the layout stays stable across frames.
 */

import type { Edge, NodeId, RankVector, WeightVector } from '../core/types.js';
import type { Position } from '../scenario/types.js';

export const ALGORITHM_NAME = 'Custom PageRank variant';
export const DECAY_DESCRIPTION = 'Exponential';

/** Maximum edge pen width, reached at weight 1 */
const EDGE_WIDTH_SCALE = 8;

export interface DotInput {
  ranks: RankVector;
  edges: readonly Edge[];
  weights: WeightVector;
  experts: readonly NodeId[];
  positions: readonly Position[];
  /** 1-based frame number */
  frameIndex: number;
  frameTotal: number;
}

function hexByte(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, '0');
}

/**
 * Fill colour for a rank: white at 0, pure blue at 1.
 */
export function rankColor(rank: number): string {
  const r = Math.min(1, Math.max(0, rank));
  const level = Math.floor((1 - r) * 255);
  return `#${hexByte(level)}${hexByte(level)}FF`;
}

function nodeLine(node: NodeId, rank: number, position: Position, isExpert: boolean): string {
  const label = `${node} (${rank.toFixed(2)})`;
  const pos = `${position.x.toFixed(2)},${position.y.toFixed(2)}!`;
  const border = isExpert ? ', color="darkgreen", penwidth=8' : '';
  return (
    `  ${node} [label="${label}", shape=circle, style=filled, fillcolor="${rankColor(rank)}"` +
    `${border}, fontsize=20, pos="${pos}", pin=true];`
  );
}

function edgeLine(edge: Edge, weight: number): string {
  if (weight === 0) {
    return `  ${edge.source} -> ${edge.target} [style=invis];`;
  }
  return `  ${edge.source} -> ${edge.target} [penwidth=${EDGE_WIDTH_SCALE * weight}];`;
}

/**
 * Render one frame as a DOT digraph.
 */
export function renderDot(input: DotInput): string {
  const { ranks, edges, weights, positions, frameIndex, frameTotal } = input;
  const experts = new Set(input.experts);

  const title = [
    'Trust flow over time',
    `Algorithm: ${ALGORITHM_NAME}`,
    `Edge decay: ${DECAY_DESCRIPTION}`,
    `Frame: ${frameIndex}/${frameTotal}`,
  ].join('\\n');

  const lines = [
    'digraph G {',
    '  nodesep=0.8;',
    '  graph [layout=neato, overlap=false, splines=true, pad="1.0,1.0", fontsize=20];',
    '  labelloc="t";',
    '  labeljust="l";',
    '  labelfontsize=26;',
    `  label="${title}";`,
  ];

  ranks.forEach((rank, node) => {
    lines.push(nodeLine(node, rank, positions[node], experts.has(node)));
  });
  edges.forEach((edge, i) => {
    lines.push(edgeLine(edge, weights[i]));
  });

  lines.push('}');
  return lines.join('\n') + '\n';
}
