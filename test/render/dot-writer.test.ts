/**
 * Tests for DOT rendering.
 */

import { describe, it, expect } from 'vitest';
import { rankColor, renderDot, type DotInput } from '../../src/render/dot-writer.js';

const input: DotInput = {
  ranks: [0.375, 0.625],
  edges: [
    { source: 0, target: 1, creationTime: 0 },
    { source: 1, target: 0, creationTime: 5 },
  ],
  weights: [0.5, 0],
  experts: [0],
  positions: [
    { x: 1, y: 0 },
    { x: -1, y: 0.5 },
  ],
  frameIndex: 1,
  frameTotal: 21,
};

describe('rankColor', () => {
  it('is white at rank 0 and blue at rank 1', () => {
    expect(rankColor(0)).toBe('#FFFFFF');
    expect(rankColor(1)).toBe('#0000FF');
  });

  it('clamps ranks outside [0, 1]', () => {
    expect(rankColor(-0.2)).toBe('#FFFFFF');
    expect(rankColor(1.7)).toBe('#0000FF');
  });

  it('truncates the shade level', () => {
    // (1 - 0.375) * 255 = 159.375
    expect(rankColor(0.375)).toBe('#9F9FFF');
    expect(rankColor(0.5)).toBe('#7F7FFF');
  });
});

describe('renderDot', () => {
  const lines = renderDot(input).split('\n');

  it('writes the graph header and title', () => {
    expect(lines.slice(0, 7)).toEqual([
      'digraph G {',
      '  nodesep=0.8;',
      '  graph [layout=neato, overlap=false, splines=true, pad="1.0,1.0", fontsize=20];',
      '  labelloc="t";',
      '  labeljust="l";',
      '  labelfontsize=26;',
      '  label="Trust flow over time\\nAlgorithm: Custom PageRank variant\\nEdge decay: Exponential\\nFrame: 1/21";',
    ]);
  });

  it('outlines expert nodes in dark green', () => {
    expect(lines[7]).toBe(
      '  0 [label="0 (0.38)", shape=circle, style=filled, fillcolor="#9F9FFF", color="darkgreen", penwidth=8, fontsize=20, pos="1.00,0.00!", pin=true];',
    );
  });

  it('writes plain nodes at their pinned position', () => {
    expect(lines[8]).toBe(
      '  1 [label="1 (0.63)", shape=circle, style=filled, fillcolor="#5F5FFF", fontsize=20, pos="-1.00,0.50!", pin=true];',
    );
  });

  it('scales edge width by weight and hides edges with zero weight', () => {
    expect(lines[9]).toBe('  0 -> 1 [penwidth=4];');
    expect(lines[10]).toBe('  1 -> 0 [style=invis];');
  });

  it('closes the graph with a trailing newline', () => {
    expect(lines.slice(11)).toEqual(['}', '']);
  });
});
