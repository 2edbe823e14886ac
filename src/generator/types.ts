/**
 * Topology Generator - Types
 */

import type { TopologyGraph } from '../graph-engine/topology-graph.js';
import type { NodeId, NodeKind, TrafficFlow } from '../shared/types/topology.js';

export type WidthRole = 'initiator' | 'target';

/**
 * How one endpoint NIU was sized
 */
export interface DerivedWidth {
  name: string;
  role: WidthRole;
  niuId: NodeId;
  bandwidth: number; // GB/s
  frequency: number; // MHz
  width: number;
  clockDomain: string;
}

export interface CrossbarSummary {
  id: NodeId;
  name: string;
  width: number;
  numPorts: number;
  clockDomain: string;
}

export interface SynthesisReport {
  nodeCounts: Record<NodeKind, number>;
  edgeCount: number;
  initiatorCount: number;
  targetCount: number;
  widths: DerivedWidth[];
  crossbar: CrossbarSummary;
  bandwidth: {
    required: number; // Σ flow bandwidth
    capacity: number; // Σ target maxBandwidth
    utilization: number; // required / capacity
  };
}

export interface GeneratedTopology {
  graph: TopologyGraph;
  /** Requirement flows resolved to node ids, declaration order */
  flows: TrafficFlow[];
  report: SynthesisReport;
}

export const CROSSBAR_NAME = 'Crossbar';
export const INITIATOR_NIU_LATENCY = 1;
export const CROSSBAR_LINK_LATENCY = 2;
/** NIU -> Target latency is the target's access latency divided by this */
export const TARGET_NIU_LATENCY_DIVISOR = 10;
