/**
 * Rank snapshots across a sequence of query times.
 *
 * The graph, its engine and the teleport vector are built once per
 * scenario; only the edge weights change from frame to frame. Each frame's
 * ranks start again from uniform mass.
 */

import { decayedWeights } from '../core/edge-decay.js';
import { createGraph } from '../core/graph.js';
import { RankFlowEngine } from '../core/rank-flow.js';
import { buildTeleportVector } from '../core/teleport.js';
import type { RankVector, TeleportVector, WeightVector } from '../core/types.js';
import type { FlowOptions } from '../config/flow-config.js';
import type { Scenario } from '../scenario/types.js';
import { InvalidInputError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('frames');

/**
 * One time snapshot.
 */
export interface Frame {
  /** Query time */
  time: number;
  /** 1-based position in the sequence */
  index: number;
  /** Number of frames in the sequence */
  total: number;
  weights: WeightVector;
  ranks: RankVector;
}

type FrameOptions = Omit<FlowOptions, 'maxTime'>;

interface PreparedScenario {
  engine: RankFlowEngine;
  teleport: TeleportVector;
}

function prepare(scenario: Scenario, options: FrameOptions): PreparedScenario {
  const engine = new RankFlowEngine(createGraph(scenario.numNodes, scenario.edges));
  const teleport = buildTeleportVector(
    scenario.numNodes,
    scenario.experts,
    options.expertFraction,
  );
  return { engine, teleport };
}

function snapshot(
  prepared: PreparedScenario,
  time: number,
  total: number,
  options: FrameOptions,
): Frame {
  const { engine, teleport } = prepared;
  const weights = decayedWeights(engine.graph.edges, time, options.decayConstant);
  const ranks = engine.run(weights, teleport, options.dampingFactor, options.iterations);
  return { time, index: time + 1, total, weights, ranks };
}

function checkTime(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidInputError(`${name} must be a non-negative integer, got ${value}`, 'INVALID_TIME');
  }
}

/**
 * Compute frames for every query time in 0..maxTime.
 */
export function computeFrames(scenario: Scenario, options: FlowOptions): Frame[] {
  checkTime(options.maxTime, 'maxTime');

  const prepared = prepare(scenario, options);
  const total = options.maxTime + 1;
  const frames: Frame[] = [];

  for (let time = 0; time <= options.maxTime; time++) {
    frames.push(snapshot(prepared, time, total, options));
  }

  log.debug(`Computed ${frames.length} frames`, {
    scenario: scenario.name,
    iterations: options.iterations,
  });
  return frames;
}

/**
 * Compute a single frame. A time past `maxTime` extends the sequence it is
 * numbered against.
 */
export function computeFrame(scenario: Scenario, time: number, options: FlowOptions): Frame {
  checkTime(time, 'time');
  checkTime(options.maxTime, 'maxTime');
  return snapshot(prepare(scenario, options), time, Math.max(options.maxTime, time) + 1, options);
}
