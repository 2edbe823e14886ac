/**
 * Bandwidth Optimizer
 *
 * Flow-driven restructuring plus the per-flow implementation planner.
 */

// Types
export type {
  AggregatedFlow,
  ArbiterGroup,
  BandwidthClass,
  DedicatedPath,
  FlowClassification,
  FlowSelection,
  ImplementationKind,
  ImplementationOption,
  ImplementationPlan,
  ObjectiveWeights,
  OptimizationResult,
  OptimizeOptions,
  PlanSummary,
  RemovedEdge
} from './types.js';

export {
  IMPLEMENTATION_OPTIONS,
  MAX_AREA_COST,
  WEIGHT_PROFILES
} from './types.js';

// Restructuring
export {
  aggregateFlows,
  attachPoint,
  classifyBandwidth,
  classifyFlows,
  crossbarBandwidth,
  findCrossbar,
  latencyRegressions,
  optimizeBandwidth
} from './bandwidth-optimizer.js';

// Implementation planning
export {
  implementationCost,
  implementationOptions,
  normalizeWeights,
  planFlowImplementations,
  type PlanOptions
} from './implementation-planner.js';
