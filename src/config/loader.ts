/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (TRUSTFLOW_*)
 * 3. Project config file (./trustflow.config.json)
 * 4. User config file (~/.trustflow/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_FLOW_OPTIONS, type FlowOptions } from './flow-config.js';
import { ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

/** External config file structure (matches config.schema.json) */
export interface ExternalConfig {
  rank?: {
    dampingFactor?: number;
    iterations?: number;
  };
  decay?: {
    constant?: number;
  };
  teleport?: {
    expertFraction?: number;
  };
  frames?: {
    maxTime?: number;
  };
  output?: {
    folder?: string;
  };
  dashboard?: {
    port?: number;
  };
}

/** Fully resolved config: every section and field present. */
export type ResolvedConfig = {
  [K in keyof ExternalConfig]-?: Required<NonNullable<ExternalConfig[K]>>;
};

/** Default external config values */
const EXTERNAL_DEFAULTS: ResolvedConfig = {
  rank: {
    dampingFactor: DEFAULT_FLOW_OPTIONS.dampingFactor,
    iterations: DEFAULT_FLOW_OPTIONS.iterations,
  },
  decay: {
    constant: DEFAULT_FLOW_OPTIONS.decayConstant,
  },
  teleport: {
    expertFraction: DEFAULT_FLOW_OPTIONS.expertFraction,
  },
  frames: {
    maxTime: DEFAULT_FLOW_OPTIONS.maxTime,
  },
  output: {
    folder: 'output',
  },
  dashboard: {
    port: 3333,
  },
};

/**
 * Expand a leading `~` to the user's home directory.
 */
export function resolvePath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return join(homedir(), path.slice(1));
  }
  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick the known, correctly typed fields out of a parsed config document.
 * Mistyped fields are reported and dropped; unknown keys are ignored.
 */
export function parseExternalConfig(value: unknown, source = 'config'): ExternalConfig {
  if (!isRecord(value)) {
    log.warn(`Ignoring ${source}: not a JSON object`);
    return {};
  }

  const read = (sectionName: string, field: string): unknown => {
    const section = value[sectionName];
    return isRecord(section) ? section[field] : undefined;
  };
  const num = (sectionName: string, field: string): number | undefined => {
    const raw = read(sectionName, field);
    if (raw === undefined) return undefined;
    if (typeof raw !== 'number') {
      log.warn(`Ignoring ${sectionName}.${field}: expected a number`, { source });
      return undefined;
    }
    return raw;
  };
  const str = (sectionName: string, field: string): string | undefined => {
    const raw = read(sectionName, field);
    if (raw === undefined) return undefined;
    if (typeof raw !== 'string') {
      log.warn(`Ignoring ${sectionName}.${field}: expected a string`, { source });
      return undefined;
    }
    return raw;
  };

  return {
    rank: { dampingFactor: num('rank', 'dampingFactor'), iterations: num('rank', 'iterations') },
    decay: { constant: num('decay', 'constant') },
    teleport: { expertFraction: num('teleport', 'expertFraction') },
    frames: { maxTime: num('frames', 'maxTime') },
    output: { folder: str('output', 'folder') },
    dashboard: { port: num('dashboard', 'port') },
  };
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const content: unknown = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
    return parseExternalConfig(content, path);
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Load config from environment variables.
 * Variables are prefixed with TRUSTFLOW_ and use underscores for nesting.
 * Examples:
 *   TRUSTFLOW_RANK_DAMPING_FACTOR=0.85
 *   TRUSTFLOW_DECAY_CONSTANT=0.2
 *   TRUSTFLOW_OUTPUT_FOLDER=./frames
 */
function loadEnvConfig(): ExternalConfig {
  const config: ExternalConfig = {};
  const env = process.env;

  // Rank
  if (env.TRUSTFLOW_RANK_DAMPING_FACTOR) {
    config.rank = config.rank ?? {};
    config.rank.dampingFactor = parseFloat(env.TRUSTFLOW_RANK_DAMPING_FACTOR);
  }
  if (env.TRUSTFLOW_RANK_ITERATIONS) {
    config.rank = config.rank ?? {};
    config.rank.iterations = parseInt(env.TRUSTFLOW_RANK_ITERATIONS, 10);
  }

  // Decay
  if (env.TRUSTFLOW_DECAY_CONSTANT) {
    config.decay = { constant: parseFloat(env.TRUSTFLOW_DECAY_CONSTANT) };
  }

  // Teleport
  if (env.TRUSTFLOW_TELEPORT_EXPERT_FRACTION) {
    config.teleport = { expertFraction: parseFloat(env.TRUSTFLOW_TELEPORT_EXPERT_FRACTION) };
  }

  // Frames
  if (env.TRUSTFLOW_FRAMES_MAX_TIME) {
    config.frames = { maxTime: parseInt(env.TRUSTFLOW_FRAMES_MAX_TIME, 10) };
  }

  // Output
  if (env.TRUSTFLOW_OUTPUT_FOLDER) {
    config.output = { folder: env.TRUSTFLOW_OUTPUT_FOLDER };
  }

  // Dashboard
  if (env.TRUSTFLOW_DASHBOARD_PORT) {
    config.dashboard = { port: parseInt(env.TRUSTFLOW_DASHBOARD_PORT, 10) };
  }

  return config;
}

/**
 * Deep merge two config objects, with source overriding target.
 * Fields left undefined in source keep the target's value.
 */
function deepMerge(target: ResolvedConfig, source: ExternalConfig): ResolvedConfig {
  return {
    rank: {
      dampingFactor: source.rank?.dampingFactor ?? target.rank.dampingFactor,
      iterations: source.rank?.iterations ?? target.rank.iterations,
    },
    decay: {
      constant: source.decay?.constant ?? target.decay.constant,
    },
    teleport: {
      expertFraction: source.teleport?.expertFraction ?? target.teleport.expertFraction,
    },
    frames: {
      maxTime: source.frames?.maxTime ?? target.frames.maxTime,
    },
    output: {
      folder: source.output?.folder ?? target.output.folder,
    },
    dashboard: {
      port: source.dashboard?.port ?? target.dashboard.port,
    },
  };
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  // Rank validation
  const damping = config.rank?.dampingFactor;
  if (damping !== undefined && !(damping >= 0 && damping <= 1)) {
    errors.push('rank.dampingFactor must be between 0 and 1 (inclusive)');
  }
  const iterations = config.rank?.iterations;
  if (iterations !== undefined && (!Number.isInteger(iterations) || iterations < 0)) {
    errors.push('rank.iterations must be a non-negative integer');
  }

  // Decay validation
  const constant = config.decay?.constant;
  if (constant !== undefined && !Number.isFinite(constant)) {
    errors.push('decay.constant must be a finite number');
  }

  // Teleport validation
  const fraction = config.teleport?.expertFraction;
  if (fraction !== undefined && !(fraction >= 0 && fraction <= 1)) {
    errors.push('teleport.expertFraction must be between 0 and 1 (inclusive)');
  }

  // Frames validation
  const maxTime = config.frames?.maxTime;
  if (maxTime !== undefined && (!Number.isInteger(maxTime) || maxTime < 0)) {
    errors.push('frames.maxTime must be a non-negative integer');
  }

  // Output validation
  if (config.output?.folder !== undefined && config.output.folder.length === 0) {
    errors.push('output.folder must not be empty');
  }

  // Dashboard validation
  const port = config.dashboard?.port;
  if (port !== undefined && (!Number.isInteger(port) || port < 1 || port > 65535)) {
    errors.push('dashboard.port must be an integer between 1 and 65535');
  }

  return errors;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (cliOverrides)
 * 2. Environment variables (TRUSTFLOW_*)
 * 3. Project config file (./trustflow.config.json)
 * 4. User config file (~/.trustflow/config.json)
 * 5. Built-in defaults
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  let config = EXTERNAL_DEFAULTS;

  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? '~/.trustflow/config.json');
    if (userConfig) {
      config = deepMerge(config, userConfig);
    }
  }

  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'trustflow.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = deepMerge(config, projectConfig);
    }
  }

  if (!options.skipEnv) {
    config = deepMerge(config, loadEnvConfig());
  }

  if (options.cliOverrides) {
    config = deepMerge(config, options.cliOverrides);
  }

  return config;
}

/**
 * Convert the resolved config to the options of a frame computation.
 *
 * @throws ConfigError (CONFIG_INVALID) listing every validation failure
 */
export function toFlowOptions(config: ResolvedConfig): FlowOptions {
  const errors = validateExternalConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }
  return {
    maxTime: config.frames.maxTime,
    decayConstant: config.decay.constant,
    expertFraction: config.teleport.expertFraction,
    dampingFactor: config.rank.dampingFactor,
    iterations: config.rank.iterations,
  };
}

// Re-export for convenience
export { EXTERNAL_DEFAULTS };
