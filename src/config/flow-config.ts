/**
 * Runtime parameters for computing a frame sequence.
 */

export interface FlowOptions {
  /** Last query time; frames cover 0..maxTime inclusive */
  maxTime: number;
  /** Exponential decay constant k in w = e^(-k·Δt) */
  decayConstant: number;
  /** Share of restart mass reserved for expert nodes */
  expertFraction: number;
  /** Share of mass routed along edges each iteration */
  dampingFactor: number;
  /** Rank iterations per frame */
  iterations: number;
}

export const DEFAULT_FLOW_OPTIONS: FlowOptions = {
  maxTime: 20,
  decayConstant: 0.1,
  expertFraction: 0.8,
  dampingFactor: 0.5,
  iterations: 10,
};
