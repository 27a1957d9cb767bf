import { Router } from 'express';
import type { FlowOptions } from '../../config/flow-config.js';
import { computeFrame, computeFrames } from '../../frames/frame-sequence.js';
import { renderFrame } from '../../render/frame-writer.js';
import { getScenario, listScenarios } from '../../scenario/scenarios.js';
import { InvalidInputError } from '../../utils/errors.js';

/** Most frames a single request may compute. */
export const MAX_FRAMES = 1000;

/**
 * Numeric query or path parameter. Undefined when absent or empty, NaN when
 * present but not numeric.
 */
function toNumber(value: unknown): number | undefined {
  return typeof value === 'string' && value !== '' ? Number(value) : undefined;
}

export function createScenariosRouter(options: FlowOptions): Router {
  const router = Router();

  /**
   * GET /api/scenarios - Names of the built-in scenarios.
   */
  router.get('/', (_req, res) => {
    res.json({ scenarios: listScenarios() });
  });

  /**
   * GET /api/scenarios/:name/frames - Every frame in 0..maxTime.
   */
  router.get('/:name/frames', (req, res) => {
    const scenario = getScenario(req.params.name);
    const maxTime = toNumber(req.query.maxTime) ?? options.maxTime;
    if (maxTime >= MAX_FRAMES) {
      throw new InvalidInputError(
        `maxTime must be below ${MAX_FRAMES}, got ${maxTime}`,
        'TOO_MANY_FRAMES',
      );
    }
    const frames = computeFrames(scenario, { ...options, maxTime });
    res.json({ scenario: scenario.name, frames });
  });

  /**
   * GET /api/scenarios/:name/frames/:time - One frame.
   */
  router.get('/:name/frames/:time', (req, res) => {
    const scenario = getScenario(req.params.name);
    const frame = computeFrame(scenario, Number(req.params.time), options);
    res.json({ scenario: scenario.name, frame });
  });

  /**
   * GET /api/scenarios/:name/frames/:time/dot - One frame as Graphviz DOT.
   */
  router.get('/:name/frames/:time/dot', (req, res) => {
    const scenario = getScenario(req.params.name);
    const frame = computeFrame(scenario, Number(req.params.time), options);
    res.type('text/vnd.graphviz').send(renderFrame(scenario, frame));
  });

  return router;
}
