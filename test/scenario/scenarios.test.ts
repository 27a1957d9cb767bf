/**
 * Tests for built-in scenarios, scenario files and layout.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  TRUST_FLOW_EXAMPLE,
  getScenario,
  listScenarios,
  resolveScenario,
} from '../../src/scenario/scenarios.js';
import { loadScenarioFile, parseScenario } from '../../src/scenario/loader.js';
import { circularLayout } from '../../src/scenario/layout.js';
import { InvalidInputError, ScenarioError } from '../../src/utils/errors.js';

describe('built-in scenarios', () => {
  it('lists the trust flow example', () => {
    expect(listScenarios()).toEqual(['trust-flow-example']);
  });

  it('describes a six node graph with one expert and one edge per time step', () => {
    const scenario = getScenario('trust-flow-example');

    expect(scenario).toBe(TRUST_FLOW_EXAMPLE);
    expect(scenario.numNodes).toBe(6);
    expect(scenario.experts).toEqual([0]);
    expect(scenario.edges.map((e) => e.creationTime)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(scenario.edges.map((e) => `${e.source}->${e.target}`)).toEqual([
      '0->1',
      '1->2',
      '1->3',
      '3->4',
      '3->5',
      '5->1',
    ]);
  });

  it('hands out a frozen built-in', () => {
    const scenario = getScenario('trust-flow-example');

    expect(Object.isFrozen(scenario)).toBe(true);
    expect(Object.isFrozen(scenario.edges)).toBe(true);
    expect(Object.isFrozen(scenario.experts)).toBe(true);
    expect(scenario.edges.every((edge) => Object.isFrozen(edge))).toBe(true);
    expect(Reflect.set(scenario.experts, 1, 3)).toBe(false);
    expect(getScenario('trust-flow-example').experts).toEqual([0]);
  });

  it('throws SCENARIO_NOT_FOUND for an unknown name', () => {
    expect(() => getScenario('missing')).toThrow(ScenarioError);
    expect(() => getScenario('missing')).toThrow('Unknown scenario: missing');
  });
});

describe('scenario files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'trustflow-scenario-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const triangle = {
    name: 'triangle',
    numNodes: 3,
    experts: [2],
    edges: [
      { source: 0, target: 1, creationTime: 0 },
      { source: 1, target: 2, creationTime: 1 },
      { source: 2, target: 0, creationTime: 2 },
    ],
  };

  it('loads a scenario from a JSON file', () => {
    const path = join(dir, 'triangle.json');
    writeFileSync(path, JSON.stringify(triangle));

    expect(loadScenarioFile(path)).toEqual(triangle);
  });

  it('resolves a path when no built-in scenario matches', () => {
    const path = join(dir, 'triangle.json');
    writeFileSync(path, JSON.stringify(triangle));

    expect(resolveScenario(path).name).toBe('triangle');
    expect(resolveScenario('trust-flow-example')).toBe(TRUST_FLOW_EXAMPLE);
  });

  it('throws SCENARIO_NOT_FOUND for a reference that is neither', () => {
    expect(() => resolveScenario(join(dir, 'nope.json'))).toThrow(ScenarioError);
  });

  it('wraps unparsable files in SCENARIO_READ_FAILED', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ not json');

    let caught: unknown;
    try {
      loadScenarioFile(path);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ScenarioError);
    expect(caught).toMatchObject({ code: 'SCENARIO_READ_FAILED' });
  });

  describe('parseScenario', () => {
    it('rejects a non-object document', () => {
      expect(() => parseScenario([1, 2])).toThrow(InvalidInputError);
    });

    it('rejects a missing name', () => {
      expect(() => parseScenario({ ...triangle, name: '' })).toThrow(
        'scenario.name must be a non-empty string',
      );
    });

    it('rejects non-integer edge fields', () => {
      expect(() =>
        parseScenario({ ...triangle, edges: [{ source: 0, target: '1', creationTime: 0 }] }),
      ).toThrow('edges[0].target must be an integer');
    });

    it('rejects non-integer experts', () => {
      expect(() => parseScenario({ ...triangle, experts: ['a'] })).toThrow(
        'experts[0] must be an integer',
      );
    });

    it('rejects edges outside the node range', () => {
      let caught: unknown;
      try {
        parseScenario({ ...triangle, numNodes: 2 });
      } catch (error) {
        caught = error;
      }
      expect(caught).toMatchObject({ code: 'EDGE_OUT_OF_BOUNDS' });
    });
  });
});

describe('circularLayout', () => {
  it('places nodes evenly on the unit circle starting at angle 0', () => {
    const positions = circularLayout(4);

    const expected = [
      [1, 0],
      [0, 1],
      [-1, 0],
      [0, -1],
    ];
    positions.forEach((p, i) => {
      expect(p.x).toBeCloseTo(expected[i][0], 12);
      expect(p.y).toBeCloseTo(expected[i][1], 12);
    });
  });

  it('returns one position per node', () => {
    expect(circularLayout(6)).toHaveLength(6);
    expect(circularLayout(1)).toEqual([{ x: 1, y: 0 }]);
  });
});
