/**
 * Sweep Controller
 */

// Types
export type {
  LatencyOracle,
  LatencyProbe,
  NetworkSimulator,
  OracleAnswer,
  SimResult,
  SweepOptions,
  SweepOutcome,
  SweepResult,
  SweepSample,
  SweepState
} from './types.js';

export {
  DEFAULT_MIN_STEP,
  DEFAULT_SLOPE_LIMIT,
  DEFAULT_ZERO_LOAD_FACTOR,
  MAX_INJECTION_RATE
} from './types.js';

export { SweepController, createSweepOptions } from './sweep-controller.js';
export { createSimulationOracle, toLatencyProbe } from './simulation-oracle.js';
