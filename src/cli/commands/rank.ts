import type { Command } from '../types.js';
import { flowOverrides, getFlag, getNumberFlag } from '../utils.js';
import { loadConfig, toFlowOptions } from '../../config/loader.js';
import { computeFrame } from '../../frames/frame-sequence.js';
import { resolveScenario } from '../../scenario/scenarios.js';

export const DEFAULT_SCENARIO = 'trust-flow-example';

export const rankCommand: Command = {
  name: 'rank',
  description: 'Print node ranks at one query time',
  usage:
    'trustflow rank [--scenario <name|file>] [--time <t>] [--json] [--damping <d>] [--iterations <n>] [--decay <k>] [--expert-fraction <f>]',
  handler: async (args) => {
    const options = toFlowOptions(loadConfig({ cliOverrides: flowOverrides(args) }));
    const scenario = resolveScenario(getFlag(args, 'scenario') ?? DEFAULT_SCENARIO);
    const time = getNumberFlag(args, 'time') ?? options.maxTime;

    const frame = computeFrame(scenario, time, options);

    if (args.includes('--json')) {
      console.log(
        JSON.stringify(
          { scenario: scenario.name, time: frame.time, weights: frame.weights, ranks: frame.ranks },
          null,
          2,
        ),
      );
      return;
    }

    const experts = new Set(scenario.experts);
    console.log(`Ranks for ${scenario.name} at time ${frame.time}:`);
    frame.ranks.forEach((rank, node) => {
      const marker = experts.has(node) ? ' (expert)' : '';
      console.log(`  ${String(node).padStart(3)}  ${rank.toFixed(4)}${marker}`);
    });
  },
};
