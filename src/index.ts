/**
 * NoC Topology Engine
 *
 * Synthesizes, validates and optimizes on-chip interconnect topologies.
 */

export * from './graph-engine/index.js';
export * from './validation/index.js';
export * from './generator/index.js';
export * from './optimizer/index.js';
export * from './sweep/index.js';
export * from './pipeline/index.js';

export {
  DEFAULT_ENGINE_CONFIG,
  createEngineConfig,
  validateConfig,
  type EngineConfig
} from './shared/config.js';
export {
  BandwidthError,
  CapacityError,
  ConfigError,
  LatencyError,
  RouteNotFoundError,
  SimulationError,
  StructuralError,
  TopologyError,
  type TopologyErrorName
} from './shared/errors.js';
export { EngineLogger, EngineLogLevel } from './shared/logger.js';
export {
  parseRequirements,
  parseTopologyDescription,
  toTopologyDescription,
  type DescriptionContext,
  type TopologyDescription,
  type TopologyDescriptionRecord
} from './shared/parsers/topology-description.js';
export {
  MAX_ARBITER_INPUTS,
  MAX_DECODER_OUTPUTS,
  SUPPORTED_WIDTHS,
  assertNever,
  type ArbiterNode,
  type ArbiterPolicy,
  type ClockConverterNode,
  type ClockDomain,
  type DecoderNode,
  type Direction,
  type InitiatorNode,
  type NiuNode,
  type NodeId,
  type NodeKind,
  type NodeOfKind,
  type RouterNode,
  type RouterRole,
  type TargetNode,
  type TopologyEdge,
  type TopologyNode,
  type TrafficFlow,
  type TrafficPattern,
  type WidthConverterNode
} from './shared/types/topology.js';
export type {
  InitiatorSpec,
  OptimizeFor,
  Requirements,
  TargetSpec,
  TrafficFlowSpec
} from './shared/types/requirements.js';
export { ceilPow2, deriveWidth, isSupportedWidth, requiredBits } from './shared/utils/width.js';
