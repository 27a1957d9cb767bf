/**
 * Tests for the teleportation distribution.
 */

import { describe, it, expect } from 'vitest';
import { buildTeleportVector } from '../../src/core/teleport.js';
import { InvalidInputError } from '../../src/utils/errors.js';

function sum(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof InvalidInputError ? error.code : 'NOT_INVALID_INPUT';
  }
  return undefined;
}

describe('buildTeleportVector', () => {
  it('gives every node the base share and experts an extra share', () => {
    const teleport = buildTeleportVector(6, [0], 0.8);

    expect(teleport).toHaveLength(6);
    expect(teleport[0]).toBeCloseTo(0.2 / 6 + 0.8, 12);
    for (let i = 1; i < 6; i++) {
      expect(teleport[i]).toBeCloseTo(0.2 / 6, 12);
    }
  });

  it('sums to 1', () => {
    expect(sum(buildTeleportVector(6, [0], 0.8))).toBeCloseTo(1, 9);
    expect(sum(buildTeleportVector(7, [1, 3, 5], 0.35))).toBeCloseTo(1, 9);
    expect(sum(buildTeleportVector(1, [0], 1))).toBeCloseTo(1, 9);
  });

  it('splits the expert share equally', () => {
    expect(buildTeleportVector(4, [1, 2], 0.5)).toEqual([0.125, 0.375, 0.375, 0.125]);
  });

  it('counts a repeated expert once', () => {
    expect(buildTeleportVector(4, [1, 1, 2], 0.5)).toEqual([0.125, 0.375, 0.375, 0.125]);
  });

  it('accepts any iterable of experts', () => {
    expect(buildTeleportVector(4, new Set([1, 2]), 0.5)).toEqual([0.125, 0.375, 0.375, 0.125]);
  });

  it('gives every expert more than any non-expert when the fraction is positive', () => {
    const teleport = buildTeleportVector(10, [2, 7], 0.01);
    const experts = [teleport[2], teleport[7]];
    const others = teleport.filter((_, i) => i !== 2 && i !== 7);

    expect(Math.min(...experts)).toBeGreaterThan(Math.max(...others));
  });

  it('is uniform with no experts and a zero fraction', () => {
    expect(buildTeleportVector(4, [], 0)).toEqual([0.25, 0.25, 0.25, 0.25]);
  });

  it('is uniform with experts and a zero fraction', () => {
    expect(buildTeleportVector(4, [3], 0)).toEqual([0.25, 0.25, 0.25, 0.25]);
  });

  it('rejects a nonzero fraction with no experts', () => {
    expect(() => buildTeleportVector(5, [], 0.8)).toThrow(InvalidInputError);
    expect(codeOf(() => buildTeleportVector(5, [], 0.8))).toBe('EMPTY_EXPERT_SET');
  });

  it('rejects an expert outside the node range', () => {
    expect(codeOf(() => buildTeleportVector(3, [3], 0.5))).toBe('EXPERT_OUT_OF_BOUNDS');
    expect(codeOf(() => buildTeleportVector(3, [-1], 0.5))).toBe('EXPERT_OUT_OF_BOUNDS');
    expect(codeOf(() => buildTeleportVector(3, [0.5], 0.5))).toBe('EXPERT_OUT_OF_BOUNDS');
  });

  it('rejects a fraction outside [0, 1]', () => {
    expect(codeOf(() => buildTeleportVector(3, [0], 1.5))).toBe('INVALID_EXPERT_FRACTION');
    expect(codeOf(() => buildTeleportVector(3, [0], -0.1))).toBe('INVALID_EXPERT_FRACTION');
    expect(codeOf(() => buildTeleportVector(3, [0], Number.NaN))).toBe('INVALID_EXPERT_FRACTION');
  });

  it('rejects a non-positive node count', () => {
    expect(codeOf(() => buildTeleportVector(0, [], 0))).toBe('INVALID_NODE_COUNT');
    expect(codeOf(() => buildTeleportVector(2.5, [], 0))).toBe('INVALID_NODE_COUNT');
  });
});
