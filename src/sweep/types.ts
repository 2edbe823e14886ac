/**
 * Sweep Controller - Types
 */

import type { TopologyGraph } from '../graph-engine/topology-graph.js';
import type { TrafficPattern } from '../shared/types/topology.js';

export type SweepState = 'Probing' | 'Saturated' | 'ExhaustedRange';
export type SweepOutcome = Exclude<SweepState, 'Probing'>;

/**
 * One oracle answer. `saturated` marks a run that did not complete
 * (e.g. a simulation timeout) and ends the sweep regardless of latency.
 */
export interface LatencyProbe {
  latency: number;
  saturated: boolean;
}

export type OracleAnswer = number | LatencyProbe;

/** injectionRate is a percentage in [0, 100] */
export type LatencyOracle = (injectionRate: number) => OracleAnswer | Promise<OracleAnswer>;

export interface SweepOptions {
  /** Initial rate increment (%) */
  step: number;
  /** Absolute latency above which the network counts as saturated */
  threshold: number;
  /** Saturation also when latency > factor x zero-load latency */
  zeroLoadFactor: number;
  /** Slope (Δlatency / Δrate) at which the step is halved */
  slopeLimit: number;
  minStep: number;
  maxRate: number;
}

export interface SweepSample {
  injectionRate: number;
  latency: number;
  /** Step used to reach this sample (0 for the zero-load probe) */
  step: number;
  /** Δlatency / Δrate against the previous sample */
  slope: number | null;
  saturated: boolean;
}

export interface SweepResult {
  state: SweepOutcome;
  samples: SweepSample[];
  zeroLoadLatency: number;
  /** max(threshold, zeroLoadFactor x zeroLoadLatency) */
  saturationLatency: number;
  /** First probed rate found saturated (null when the range ran out) */
  saturationRate: number | null;
  lastUnsaturatedRate: number | null;
  oracleCalls: number;
}

/**
 * Outcome of one external simulation run
 */
export interface SimResult {
  avgLatency: number;
  pktGenerated: number;
  totalReceived: number;
  timeout: boolean;
}

/**
 * External cycle-level simulator
 */
export interface NetworkSimulator {
  simulate(graph: TopologyGraph, injectionRate: number, pattern: TrafficPattern): SimResult | Promise<SimResult>;
}

export const DEFAULT_ZERO_LOAD_FACTOR = 2.5;
export const DEFAULT_SLOPE_LIMIT = 1.0;
export const DEFAULT_MIN_STEP = 1;
export const MAX_INJECTION_RATE = 100;
