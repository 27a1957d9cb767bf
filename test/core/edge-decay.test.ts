/**
 * Tests for exponential edge decay.
 */

import { describe, it, expect } from 'vitest';
import {
  BASE_EDGE_WEIGHT,
  currentWeight,
  decayedWeights,
  exponentialWeight,
} from '../../src/core/edge-decay.js';
import type { Edge } from '../../src/core/types.js';

describe('edge-decay', () => {
  const edge: Edge = { source: 0, target: 1, creationTime: 4 };

  describe('currentWeight', () => {
    it('is exactly the base weight at creation time for any decay constant', () => {
      for (const k of [0, 0.1, 2.5, -0.3]) {
        expect(currentWeight(edge, 4, k)).toBe(BASE_EDGE_WEIGHT);
      }
      expect(BASE_EDGE_WEIGHT).toBe(1);
    });

    it('is 0 before the edge exists', () => {
      for (let t = 0; t < 4; t++) {
        expect(currentWeight(edge, t, 0.1)).toBe(0);
      }
    });

    it('decays exponentially with elapsed time', () => {
      expect(currentWeight(edge, 7, 0.1)).toBeCloseTo(Math.exp(-0.3), 12);
      expect(currentWeight(edge, 14, 0.1)).toBeCloseTo(Math.exp(-1), 12);
    });

    it('strictly decreases over time when the decay constant is positive', () => {
      let previous = currentWeight(edge, 4, 0.05);
      for (let t = 5; t <= 30; t++) {
        const weight = currentWeight(edge, t, 0.05);
        expect(weight).toBeLessThan(previous);
        previous = weight;
      }
    });

    it('stays at the base weight when the decay constant is 0', () => {
      expect(currentWeight(edge, 100, 0)).toBe(1);
    });

    it('grows when the decay constant is negative', () => {
      const origin: Edge = { source: 0, target: 0, creationTime: 0 };
      expect(currentWeight(origin, 2, -0.5)).toBeCloseTo(Math.E, 12);
    });

    it('is deterministic', () => {
      expect(currentWeight(edge, 9, 0.37)).toBe(currentWeight(edge, 9, 0.37));
    });
  });

  describe('exponentialWeight', () => {
    it('scales the initial weight', () => {
      expect(exponentialWeight(2, 0.5, 2)).toBeCloseTo(2 * Math.exp(-1), 12);
    });
  });

  describe('decayedWeights', () => {
    it('returns one weight per edge in edge order', () => {
      const edges: Edge[] = [
        { source: 0, target: 1, creationTime: 0 },
        { source: 1, target: 0, creationTime: 3 },
        { source: 1, target: 1, creationTime: 2 },
      ];

      expect(decayedWeights(edges, 2, 0)).toEqual([1, 0, 1]);
    });

    it('returns an empty vector for no edges', () => {
      expect(decayedWeights([], 5, 0.1)).toEqual([]);
    });
  });
});
