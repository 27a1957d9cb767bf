import type { Command } from '../types.js';
import { flowOverrides, getFlag } from '../utils.js';
import { loadConfig, toFlowOptions } from '../../config/loader.js';
import { computeFrames } from '../../frames/frame-sequence.js';
import { writeFrames } from '../../render/frame-writer.js';
import { resolveScenario } from '../../scenario/scenarios.js';
import { DEFAULT_SCENARIO } from './rank.js';

export const renderCommand: Command = {
  name: 'render',
  description: 'Write one Graphviz DOT file per frame',
  usage:
    'trustflow render [--scenario <name|file>] [--out <folder>] [--max-time <t>] [--damping <d>] [--iterations <n>] [--decay <k>] [--expert-fraction <f>]',
  handler: async (args) => {
    const config = loadConfig({ cliOverrides: flowOverrides(args) });
    const options = toFlowOptions(config);
    const scenario = resolveScenario(getFlag(args, 'scenario') ?? DEFAULT_SCENARIO);

    const frames = computeFrames(scenario, options);
    const written = writeFrames(scenario, frames, config.output.folder);

    console.log(`Wrote ${written.length} frames for ${scenario.name} to ${config.output.folder}`);
  },
};
