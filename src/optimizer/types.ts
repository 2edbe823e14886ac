/**
 * Bandwidth Optimization - Core Types
 */

import type { EngineConfig } from '../shared/config.js';
import type { OptimizeFor } from '../shared/types/requirements.js';
import type { ClockDomain, NodeId } from '../shared/types/topology.js';
import type { InsertedConverter } from '../graph-engine/converter-inserter.js';
import type { TopologyGraph } from '../graph-engine/topology-graph.js';

// ============================================================================
// Flow classification
// ============================================================================

/**
 * All flows between one (src, dst) pair, merged
 */
export interface AggregatedFlow {
  src: NodeId;
  dst: NodeId;
  bandwidth: number; // Σ GB/s
  maxLatency: number; // tightest
  priority: number; // highest (lowest number)
  /** Position of the pair's first flow in the input list */
  firstIndex: number;
}

export type BandwidthClass = 'high' | 'medium' | 'low';

export interface FlowClassification {
  high: AggregatedFlow[];
  medium: AggregatedFlow[];
  low: AggregatedFlow[];
}

// ============================================================================
// Restructuring
// ============================================================================

export interface OptimizeOptions {
  config?: EngineConfig;
  optimizeFor?: OptimizeFor;
  /** Declared domains; the fast domain's frequency sizes dedicated routers */
  clockDomains?: readonly ClockDomain[];
}

export interface DedicatedPath {
  routerId: NodeId;
  name: string;
  initiator: NodeId;
  target: NodeId;
  bandwidth: number;
  width: number;
}

export interface ArbiterGroup {
  arbiterId: NodeId;
  name: string;
  target: NodeId;
  /** Grant order, highest priority first */
  initiators: NodeId[];
}

export interface RemovedEdge {
  src: NodeId;
  dst: NodeId;
}

export interface OptimizationResult {
  graph: TopologyGraph;
  changed: boolean;
  classification: FlowClassification;
  crossbarId: NodeId | undefined;
  dedicated: DedicatedPath[];
  arbiters: ArbiterGroup[];
  /** Crossbar connections cut (direct edges or the first/last hop of a converter chain) */
  removedEdges: RemovedEdge[];
  inserted: InsertedConverter[];
  crossbarPorts: number;
  crossbarBandwidth: {
    before: number;
    after: number;
  };
}

/** Latency of each new hop around a dedicated router or arbiter */
export const OPTIMIZER_LINK_LATENCY = 1;
export const DEDICATED_ROUTER_PORTS = 2;

// ============================================================================
// Implementation planning (tunable)
// ============================================================================

export type ImplementationKind = 'direct' | 'crossbar' | 'arbiter';

export interface ImplementationOption {
  kind: ImplementationKind;
  throughputScore: number; // 0.0 - 1.0, higher is better
  latencyCycles: number;
  areaCost: number; // arbitrary units
  usesCrossbar: boolean;
}

export interface ObjectiveWeights {
  throughput: number;
  latency: number;
  area: number;
}

export interface FlowSelection {
  flow: AggregatedFlow;
  option: ImplementationOption;
  cost: number;
  /** Chosen because the crossbar had no capacity left */
  forced: boolean;
}

export interface PlanSummary {
  distribution: Record<ImplementationKind, number>;
  totalArea: number;
  averageLatency: number;
  crossbarFlows: number;
  dedicatedPaths: number;
  arbiterFlows: number;
  crossbarLoad: number; // GB/s
}

export interface ImplementationPlan {
  weights: ObjectiveWeights;
  /** Processing order: descending bandwidth */
  selections: FlowSelection[];
  summary: PlanSummary;
}

// Option catalogue - TUNABLE
export const IMPLEMENTATION_OPTIONS: Readonly<Record<ImplementationKind, ImplementationOption>> = {
  direct: {
    kind: 'direct',
    throughputScore: 1.0, // no contention
    latencyCycles: 2,
    areaCost: 100.0, // dedicated router
    usesCrossbar: false,
  },
  crossbar: {
    kind: 'crossbar',
    throughputScore: 0.7,
    latencyCycles: 4,
    areaCost: 5.0, // amortized
    usesCrossbar: true,
  },
  arbiter: {
    kind: 'arbiter',
    throughputScore: 0.5, // arbitration overhead
    latencyCycles: 6,
    areaCost: 2.0,
    usesCrossbar: true,
  },
};

/** Area normalisation divisor */
export const MAX_AREA_COST = 100.0;

export const WEIGHT_PROFILES: Readonly<Record<OptimizeFor, ObjectiveWeights>> = {
  bandwidth: { throughput: 0.6, latency: 0.3, area: 0.1 },
  latency: { throughput: 0.2, latency: 0.7, area: 0.1 },
  none: { throughput: 0.6, latency: 0.3, area: 0.1 },
};
