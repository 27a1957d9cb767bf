/**
 * Standardized error types for trustflow.
 *
 * All errors extend from TrustFlowError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * ## Usage
 *
 * ```typescript
 * import { InvalidInputError, RenderError } from './errors.js';
 *
 * throw new InvalidInputError('dampingFactor must be within [0, 1]', 'DAMPING_OUT_OF_RANGE');
 *
 * try {
 *   writeFileSync(path, dot);
 * } catch (err) {
 *   throw new RenderError(`Failed to write ${path}`, 'FRAME_WRITE_FAILED', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all trustflow errors.
 */
export class TrustFlowError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof TrustFlowError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Input Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A precondition of the rank-flow computation was violated. Raised before
 * any iteration runs.
 *
 * Common codes:
 * - `INVALID_NODE_COUNT`: numNodes is not a positive integer
 * - `EDGE_OUT_OF_BOUNDS`: an edge endpoint is outside [0, numNodes)
 * - `INVALID_CREATION_TIME`: an edge creation time is not a non-negative integer
 * - `WEIGHT_LENGTH_MISMATCH`: weight vector is not aligned with the edges
 * - `INVALID_WEIGHT`: a weight is negative or not finite
 * - `TELEPORT_LENGTH_MISMATCH`: teleport vector is not one entry per node
 * - `INVALID_TELEPORT_ENTRY`: a teleport entry is negative or not finite
 * - `TELEPORT_NOT_NORMALIZED`: teleport vector does not sum to 1
 * - `DAMPING_OUT_OF_RANGE`: dampingFactor outside [0, 1]
 * - `INVALID_ITERATION_COUNT`: iterationCount is not a non-negative integer
 * - `EMPTY_EXPERT_SET`: nonzero expert fraction with no experts
 * - `EXPERT_OUT_OF_BOUNDS`: an expert id is outside [0, numNodes)
 * - `INVALID_EXPERT_FRACTION`: expert fraction outside [0, 1]
 * - `INVALID_SCENARIO`: a scenario document is malformed
 * - `INVALID_TIME`: a query time or maxTime is not a non-negative integer
 * - `TOO_MANY_FRAMES`: a dashboard request asks for more frames than it serves
 */
export class InvalidInputError extends TrustFlowError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: Configuration validation failed
 */
export class ConfigError extends TrustFlowError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Scenario Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors resolving a scenario.
 *
 * Common codes:
 * - `SCENARIO_NOT_FOUND`: No built-in scenario with that name
 * - `SCENARIO_READ_FAILED`: Scenario file could not be read or parsed
 */
export class ScenarioError extends TrustFlowError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Render Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors writing rendered frames.
 *
 * Common codes:
 * - `FRAME_WRITE_FAILED`: Output directory or frame file could not be written
 */
export class RenderError extends TrustFlowError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a trustflow error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof TrustFlowError && error.code === code;
}

export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isScenarioError(error: unknown): error is ScenarioError {
  return error instanceof ScenarioError;
}

export function isRenderError(error: unknown): error is RenderError {
  return error instanceof RenderError;
}

/**
 * Wrap an unknown error in a TrustFlowError.
 *
 * If the error is already a TrustFlowError, returns it unchanged.
 * Otherwise wraps it in a new TrustFlowError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): TrustFlowError {
  if (error instanceof TrustFlowError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new TrustFlowError(errorMessage, 'UNKNOWN', error);
}
