/**
 * Shared CLI utilities.
 */

import type { ExternalConfig } from '../config/loader.js';

/**
 * Value following `--name`. Undefined when the flag is absent, last, or
 * followed by another flag or an empty string.
 */
export function getFlag(args: readonly string[], name: string): string | undefined {
  const index = args.indexOf(`--${name}`);
  if (index < 0) return undefined;
  const value = args[index + 1];
  if (value === undefined || value === '' || value.startsWith('--')) {
    return undefined;
  }
  return value;
}

/**
 * Numeric value of `--name`. A present but unparsable value yields NaN so that
 * validation reports it instead of silently using the default.
 */
export function getNumberFlag(args: readonly string[], name: string): number | undefined {
  const raw = getFlag(args, name);
  return raw === undefined ? undefined : Number(raw);
}

/**
 * Config overrides shared by the commands that compute frames.
 */
export function flowOverrides(args: readonly string[]): ExternalConfig {
  return {
    rank: {
      dampingFactor: getNumberFlag(args, 'damping'),
      iterations: getNumberFlag(args, 'iterations'),
    },
    decay: { constant: getNumberFlag(args, 'decay') },
    teleport: { expertFraction: getNumberFlag(args, 'expert-fraction') },
    frames: { maxTime: getNumberFlag(args, 'max-time') },
    output: { folder: getFlag(args, 'out') },
    dashboard: { port: getNumberFlag(args, 'port') },
  };
}
