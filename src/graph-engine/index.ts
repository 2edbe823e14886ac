/**
 * Graph Engine
 *
 * Topology graph model, analysis, converter insertion and routing.
 */

export { TopologyGraph, GraphDraft, isKind } from './topology-graph.js';
export {
  declaredWidths,
  isConverter,
  nodeLatency,
  portDomain,
  portWidth,
  type PortSide
} from './node-ports.js';
export {
  bfsDistances,
  degreeCentrality,
  findConverterChain,
  hasPath,
  hasPathAvoiding,
  reachablePairs,
  shortestPath,
  weaklyConnectedComponents
} from './graph-analysis.js';
export {
  insertConverters,
  splitLatency,
  type InsertOptions,
  type InsertedConverter,
  type InsertionResult
} from './converter-inserter.js';
export {
  RoutingTable,
  SELF_PORT,
  buildRoutingTable,
  type RouteEntry
} from './routing-table.js';
