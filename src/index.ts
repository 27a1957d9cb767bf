/**
 * trustflow
 *
 * Time-decayed, mass-conserving trust flow ranking over directed graphs.
 *
 * @packageDocumentation
 */

// Rank-flow core
export * from './core/index.js';

// Scenarios and layout
export * from './scenario/index.js';

// Frame sequences
export { computeFrames, computeFrame } from './frames/frame-sequence.js';
export type { Frame } from './frames/frame-sequence.js';

// Rendering
export { renderDot, rankColor } from './render/dot-writer.js';
export type { DotInput } from './render/dot-writer.js';
export { writeFrames, renderFrame, frameFileName } from './render/frame-writer.js';

// Configuration
export { DEFAULT_FLOW_OPTIONS } from './config/flow-config.js';
export type { FlowOptions } from './config/flow-config.js';
export { loadConfig, validateExternalConfig, toFlowOptions } from './config/loader.js';
export type { ExternalConfig, ResolvedConfig, LoadConfigOptions } from './config/loader.js';

// Utils
export * from './utils/errors.js';
export { createLogger, configureLogger, setLogLevel, getLogLevel } from './utils/logger.js';
export type { Logger, LogLevel, LoggerSettings } from './utils/logger.js';
