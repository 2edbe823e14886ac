/**
 * Requirements - Type Definitions
 *
 * High-level input of the Topology Generator: endpoints and flows
 * are referenced by name, not by node id.
 */

import type { ClockDomain, TrafficPattern } from './topology.js';

export type OptimizeFor = 'bandwidth' | 'latency' | 'none';

export interface InitiatorSpec {
  name: string;
  /** Free-form category, e.g. CPU, GPU, DMA */
  type?: string;
  avgThroughput: number; // GB/s
  maxThroughput: number; // GB/s
  latencyRequirement: number; // cycles
  priority: number;
  trafficPattern?: TrafficPattern;
}

export interface TargetSpec {
  name: string;
  /** Free-form category, e.g. DDR, HBM, SRAM */
  type?: string;
  maxBandwidth: number; // GB/s
  latency: number; // cycles
  size: number; // GB
}

export interface TrafficFlowSpec {
  src: string; // Initiator name
  dst: string; // Target name
  bandwidth: number; // GB/s guaranteed
  maxLatency: number; // cycles
  priority: number;
}

export interface Requirements {
  initiators: InitiatorSpec[];
  targets: TargetSpec[];
  trafficFlows: TrafficFlowSpec[];
  clockDomains: ClockDomain[];
  optimizeFor: OptimizeFor;
}
