/**
 * Bandwidth Optimizer
 *
 * Restructures a crossbar topology using per-flow guaranteed bandwidth:
 * - high flows get a dedicated Router between their NIUs
 * - low flows into the same Target share an Arbiter in front of the crossbar
 * - medium flows stay on the crossbar
 *
 * Every phase returns a new graph snapshot. Connectivity is defined by the
 * traffic flows: no flow ever loses its path, and the bandwidth forced
 * through the crossbar never grows. A change that would put a flow over its
 * Initiator's latency requirement is not made.
 */

import { DEFAULT_ENGINE_CONFIG, validateConfig, type EngineConfig } from '../shared/config.js';
import { ConfigError, StructuralError } from '../shared/errors.js';
import { EngineLogger } from '../shared/logger.js';
import { MAX_ARBITER_INPUTS, type NodeId, type RouterNode, type TrafficFlow } from '../shared/types/topology.js';
import { deriveWidth } from '../shared/utils/width.js';
import { insertConverters, type InsertedConverter } from '../graph-engine/converter-inserter.js';
import { findConverterChain, hasPathAvoiding, shortestPath } from '../graph-engine/graph-analysis.js';
import { isConverter, portWidth } from '../graph-engine/node-ports.js';
import type { TopologyGraph } from '../graph-engine/topology-graph.js';
import { pathLatency } from '../validation/topology-validator.js';
import {
  DEDICATED_ROUTER_PORTS,
  OPTIMIZER_LINK_LATENCY,
  type AggregatedFlow,
  type ArbiterGroup,
  type BandwidthClass,
  type DedicatedPath,
  type FlowClassification,
  type OptimizationResult,
  type OptimizeOptions,
  type RemovedEdge,
} from './types.js';

// ============================================================================
// Flow classification
// ============================================================================

/**
 * Merge flows per (src, dst), keeping first-appearance order
 */
export function aggregateFlows(flows: readonly TrafficFlow[]): AggregatedFlow[] {
  const byPair = new Map<string, AggregatedFlow>();

  flows.forEach((flow, index) => {
    const key = `${flow.src}->${flow.dst}`;
    const existing = byPair.get(key);
    if (existing) {
      existing.bandwidth += flow.bandwidth;
      existing.maxLatency = Math.min(existing.maxLatency, flow.maxLatency);
      existing.priority = Math.min(existing.priority, flow.priority);
    } else {
      byPair.set(key, {
        src: flow.src,
        dst: flow.dst,
        bandwidth: flow.bandwidth,
        maxLatency: flow.maxLatency,
        priority: flow.priority,
        firstIndex: index,
      });
    }
  });

  return [...byPair.values()];
}

export function classifyBandwidth(bandwidth: number, config: EngineConfig = DEFAULT_ENGINE_CONFIG): BandwidthClass {
  if (bandwidth >= config.highBwThreshold) return 'high';
  if (bandwidth < config.lowBwThreshold) return 'low';
  return 'medium';
}

export function classifyFlows(
  flows: readonly AggregatedFlow[],
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): FlowClassification {
  const classification: FlowClassification = { high: [], medium: [], low: [] };
  for (const flow of flows) {
    classification[classifyBandwidth(flow.bandwidth, config)].push(flow);
  }
  return classification;
}

// ============================================================================
// Graph helpers
// ============================================================================

/**
 * Router tagged as crossbar, else the non-dedicated router with the most edges
 */
export function findCrossbar(graph: TopologyGraph): RouterNode | undefined {
  const routers = graph.find('Router');
  const tagged = routers.find((router) => router.role === 'crossbar');
  if (tagged) return tagged;

  let best: RouterNode | undefined;
  for (const router of routers) {
    if (router.role === 'dedicated') continue;
    if (!best || graph.degree(router.id) > graph.degree(best.id)) {
      best = router;
    }
  }
  return best;
}

/**
 * NIU an endpoint talks through (the endpoint itself when it has none)
 */
export function attachPoint(graph: TopologyGraph, endpoint: NodeId, side: 'initiator' | 'target'): NodeId {
  const neighbors = graph.neighbors(endpoint, side === 'initiator' ? 'out' : 'in');
  return neighbors.find((id) => graph.node(id)?.kind === 'NIU') ?? endpoint;
}

/**
 * Σ bandwidth of flows that have no path around the crossbar
 */
export function crossbarBandwidth(
  graph: TopologyGraph,
  flows: readonly AggregatedFlow[],
  crossbarId: NodeId
): number {
  return flows
    .filter((flow) => !hasPathAvoiding(graph, flow.src, flow.dst, crossbarId))
    .reduce((sum, flow) => sum + flow.bandwidth, 0);
}

/**
 * Drop converters left without an input or an output, until none remain
 */
function pruneDanglingConverters(graph: TopologyGraph): TopologyGraph {
  let current = graph;
  for (;;) {
    const dangling = current.nodes.filter(
      (node) => isConverter(node) && (current.degree(node.id, 'in') === 0 || current.degree(node.id, 'out') === 0)
    );
    if (dangling.length === 0) return current;

    const draft = current.edit();
    for (const node of dangling) draft.removeNode(node.id);
    current = draft.build();
  }
}

function checkFlowEndpoints(graph: TopologyGraph, flows: readonly TrafficFlow[]): void {
  flows.forEach((flow, index) => {
    if (!graph.nodeOfKind(flow.src, 'Initiator') || !graph.nodeOfKind(flow.dst, 'Target')) {
      throw new StructuralError(
        `Flow #${index} (${flow.src}->${flow.dst}) must run from an Initiator to a Target`,
        [flow.src, flow.dst]
      );
    }
    if (!(flow.bandwidth > 0)) {
      throw new ConfigError(`Flow #${index}: bandwidth must be > 0 GB/s, got ${flow.bandwidth}`, [flow.src, flow.dst]);
    }
  });
}

// ============================================================================
// Latency guard
// ============================================================================

function flowLatency(graph: TopologyGraph, flow: AggregatedFlow): number | undefined {
  const path = shortestPath(graph, flow.src, flow.dst);
  return path ? pathLatency(graph, path) : undefined;
}

/**
 * Flows a candidate restructuring pushes over their Initiator's latency
 * requirement. Latency is measured after converter insertion, as the
 * validator will see it. A flow already over budget in `baseline` only
 * counts when it gets slower.
 */
export function latencyRegressions(
  candidate: TopologyGraph,
  baseline: TopologyGraph,
  flows: readonly AggregatedFlow[],
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): AggregatedFlow[] {
  const realized = config.autoInsertConverters
    ? insertConverters(candidate, { enabled: true, fallbackDomain: config.fastDomainName }).graph
    : candidate;

  return flows.filter((flow) => {
    const limit = baseline.nodeOfKind(flow.src, 'Initiator')?.latencyRequirement;
    const after = flowLatency(realized, flow);
    if (limit === undefined || after === undefined || after <= limit) return false;

    const before = flowLatency(baseline, flow);
    return before === undefined || before <= limit || after > before;
  });
}

// ============================================================================
// Phases
// ============================================================================

function addDedicatedRouter(
  graph: TopologyGraph,
  flow: AggregatedFlow,
  config: EngineConfig,
  fastFrequency: number
): { graph: TopologyGraph; path: DedicatedPath } {
  const draft = graph.edit();
  const initiator = graph.requireNode(flow.src);
  const target = graph.requireNode(flow.dst);
  const iNiu = attachPoint(graph, flow.src, 'initiator');
  const tNiu = attachPoint(graph, flow.dst, 'target');

  const name = `${initiator.name}_${target.name}_DR`;
  const width = deriveWidth(flow.bandwidth, fastFrequency, `Dedicated router '${name}'`);
  const routerId = draft.allocateId();

  draft.addNode({
    kind: 'Router',
    id: routerId,
    name,
    width,
    clockDomain: config.fastDomainName,
    numPorts: DEDICATED_ROUTER_PORTS,
    role: 'dedicated',
  });
  draft.addEdge({
    src: iNiu,
    dst: routerId,
    width: portWidth(graph.requireNode(iNiu), 'out') ?? width,
    latency: OPTIMIZER_LINK_LATENCY,
  });
  draft.addEdge({ src: routerId, dst: tNiu, width, latency: OPTIMIZER_LINK_LATENCY });

  return {
    graph: draft.build(),
    path: { routerId, name, initiator: flow.src, target: flow.dst, bandwidth: flow.bandwidth, width },
  };
}

/**
 * Cut the crossbar connection of every endpoint whose flows are all off the crossbar
 */
function detachDedicatedEndpoints(
  graph: TopologyGraph,
  flows: readonly AggregatedFlow[],
  high: readonly AggregatedFlow[],
  crossbarId: NodeId,
  removed: RemovedEdge[]
): TopologyGraph {
  const offCrossbar = (flow: AggregatedFlow): boolean => hasPathAvoiding(graph, flow.src, flow.dst, crossbarId);
  const draft = graph.edit();
  let cut = false;

  const initiators = [...new Set(high.map((flow) => flow.src))];
  for (const initiator of initiators) {
    if (!flows.filter((flow) => flow.src === initiator).every(offCrossbar)) continue;

    const niu = attachPoint(graph, initiator, 'initiator');
    const chain = findConverterChain(graph, niu, crossbarId);
    if (!chain) continue;

    const next = chain[0] ?? crossbarId;
    draft.removeEdge(niu, next);
    removed.push({ src: niu, dst: next });
    cut = true;
  }

  const targets = [...new Set(high.map((flow) => flow.dst))];
  for (const target of targets) {
    if (!flows.filter((flow) => flow.dst === target).every(offCrossbar)) continue;

    const niu = attachPoint(graph, target, 'target');
    const chain = findConverterChain(graph, crossbarId, niu);
    if (!chain) continue;

    const prev = chain[chain.length - 1] ?? crossbarId;
    draft.removeEdge(prev, niu);
    removed.push({ src: prev, dst: niu });
    cut = true;
  }

  return cut ? pruneDanglingConverters(draft.build()) : graph;
}

/**
 * One dedicated router per high flow still on the crossbar, committed only
 * when it costs no flow its latency budget
 */
function addDedicatedRouters(
  graph: TopologyGraph,
  flows: readonly AggregatedFlow[],
  high: readonly AggregatedFlow[],
  crossbarId: NodeId,
  config: EngineConfig,
  fastFrequency: number,
  removed: RemovedEdge[]
): { graph: TopologyGraph; paths: DedicatedPath[] } {
  let current = graph;
  const paths: DedicatedPath[] = [];

  for (const flow of high) {
    // already off the crossbar
    if (hasPathAvoiding(current, flow.src, flow.dst, crossbarId)) continue;

    const trial = addDedicatedRouter(current, flow, config, fastFrequency);
    const cut: RemovedEdge[] = [];
    const candidate = detachDedicatedEndpoints(trial.graph, flows, high, crossbarId, cut);

    const regressions = latencyRegressions(candidate, graph, flows, config);
    if (regressions.length > 0) {
      EngineLogger.info(`dedicated router '${trial.path.name}' skipped: ${regressions.length} flow(s) over latency budget`);
      continue;
    }

    current = candidate;
    paths.push(trial.path);
    removed.push(...cut);
  }

  return { graph: current, paths };
}

function addArbiterGroup(
  graph: TopologyGraph,
  members: readonly AggregatedFlow[],
  name: string,
  targetId: NodeId,
  crossbar: RouterNode
): { graph: TopologyGraph; group: ArbiterGroup; cut: RemovedEdge[] } {
  const draft = graph.edit();
  const arbiterId = draft.allocateId();
  const initiators = members.map((flow) => flow.src);
  const cut: RemovedEdge[] = [];

  draft.addNode({
    kind: 'Arbiter',
    id: arbiterId,
    name,
    numInputs: members.length,
    width: crossbar.width,
    policy: 'priority',
    clockDomain: crossbar.clockDomain,
    grantOrder: initiators,
  });

  for (const flow of members) {
    const niu = attachPoint(graph, flow.src, 'initiator');
    const chain = findConverterChain(graph, niu, crossbar.id) ?? [];
    const next = chain[0] ?? crossbar.id;
    draft.removeEdge(niu, next);
    cut.push({ src: niu, dst: next });
    draft.addEdge({
      src: niu,
      dst: arbiterId,
      width: portWidth(graph.requireNode(niu), 'out') ?? crossbar.width,
      latency: OPTIMIZER_LINK_LATENCY,
    });
  }
  draft.addEdge({ src: arbiterId, dst: crossbar.id, width: crossbar.width, latency: OPTIMIZER_LINK_LATENCY });

  return {
    graph: pruneDanglingConverters(draft.build()),
    group: { arbiterId, name, target: targetId, initiators },
    cut,
  };
}

/**
 * Put up to MAX_ARBITER_INPUTS low-bandwidth initiators of one Target behind an Arbiter.
 * Members whose flows would run over their latency budget stay on the crossbar.
 */
function groupLowBandwidth(
  graph: TopologyGraph,
  flows: readonly AggregatedFlow[],
  low: readonly AggregatedFlow[],
  crossbar: RouterNode,
  config: EngineConfig,
  removed: RemovedEdge[]
): { graph: TopologyGraph; groups: ArbiterGroup[] } {
  let current = graph;
  const groups: ArbiterGroup[] = [];
  const assigned = new Set<NodeId>();

  const priorityOf = (flow: AggregatedFlow): number =>
    graph.nodeOfKind(flow.src, 'Initiator')?.priority ?? flow.priority;

  const targets = [...new Set(low.map((flow) => flow.dst))].sort((a, b) => a - b);
  for (const targetId of targets) {
    const target = graph.requireNode(targetId);
    const candidates = low
      .filter((flow) => flow.dst === targetId && !assigned.has(flow.src))
      .filter((flow) => findConverterChain(graph, attachPoint(graph, flow.src, 'initiator'), crossbar.id) !== undefined)
      .sort((a, b) => priorityOf(a) - priorityOf(b) || a.firstIndex - b.firstIndex);

    let groupIndex = 0;
    for (let start = 0; start < candidates.length; start += MAX_ARBITER_INPUTS) {
      let members = candidates.slice(start, start + MAX_ARBITER_INPUTS);

      while (members.length >= 2) {
        const trial = addArbiterGroup(current, members, `${target.name}_ARB${groupIndex}`, targetId, crossbar);
        const over = new Set(latencyRegressions(trial.graph, graph, flows, config).map((flow) => flow.src));

        if (over.size === 0) {
          current = trial.graph;
          groups.push(trial.group);
          removed.push(...trial.cut);
          members.forEach((flow) => assigned.add(flow.src));
          groupIndex++;
          break;
        }

        const kept = members.filter((flow) => !over.has(flow.src));
        if (kept.length === members.length) break;
        EngineLogger.info(`${target.name}: ${members.length - kept.length} initiator(s) kept off the arbiter for latency`);
        members = kept;
      }
    }
  }

  return { graph: current, groups };
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Restructure `graph` for the given flows
 *
 * @throws ConfigError for invalid thresholds or flow bandwidth
 * @throws StructuralError for flows with bad endpoints or a graph without a crossbar
 */
export function optimizeBandwidth(
  graph: TopologyGraph,
  flows: readonly TrafficFlow[],
  options: OptimizeOptions = {}
): OptimizationResult {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const optimizeFor = options.optimizeFor ?? 'bandwidth';

  const { valid, errors } = validateConfig(config);
  if (!valid) {
    throw new ConfigError(`Invalid optimizer configuration: ${errors.join('; ')}`);
  }
  checkFlowEndpoints(graph, flows);

  const aggregated = aggregateFlows(flows);
  const classification = classifyFlows(aggregated, config);
  const crossbar = findCrossbar(graph);

  const unchanged = (): OptimizationResult => {
    const load = crossbar ? crossbarBandwidth(graph, aggregated, crossbar.id) : 0;
    return {
      graph,
      changed: false,
      classification,
      crossbarId: crossbar?.id,
      dedicated: [],
      arbiters: [],
      removedEdges: [],
      inserted: [],
      crossbarPorts: crossbar?.numPorts ?? 0,
      crossbarBandwidth: { before: load, after: load },
    };
  };

  if (classification.high.length === 0 && classification.low.length === 0) {
    return unchanged();
  }
  if (!crossbar) {
    throw new StructuralError('Topology has no router to act as crossbar');
  }

  const before = crossbarBandwidth(graph, aggregated, crossbar.id);
  const fastFrequency =
    options.clockDomains?.find((domain) => domain.name === config.fastDomainName)?.frequency ??
    config.defaultFrequencyMhz;
  const removedEdges: RemovedEdge[] = [];

  const dedicatedPhase = addDedicatedRouters(
    graph,
    aggregated,
    classification.high,
    crossbar.id,
    config,
    fastFrequency,
    removedEdges
  );
  let current = dedicatedPhase.graph;

  let arbiters: ArbiterGroup[] = [];
  if (optimizeFor !== 'latency') {
    const grouped = groupLowBandwidth(current, aggregated, classification.low, crossbar, config, removedEdges);
    current = grouped.graph;
    arbiters = grouped.groups;
  }

  const restructured = current !== graph;
  let inserted: InsertedConverter[] = [];
  if (restructured && config.autoInsertConverters) {
    const insertion = insertConverters(current, { enabled: true, fallbackDomain: config.fastDomainName });
    current = insertion.graph;
    inserted = insertion.inserted;
  }

  const ports = current.neighbors(crossbar.id, 'both').length;
  const updated = current.nodeOfKind(crossbar.id, 'Router');
  if (updated && updated.numPorts !== ports) {
    const draft = current.edit();
    draft.updateNode({ ...updated, numPorts: ports });
    current = draft.build();
  }

  if (current === graph) {
    return unchanged();
  }

  const result: OptimizationResult = {
    graph: current,
    changed: true,
    classification,
    crossbarId: crossbar.id,
    dedicated: dedicatedPhase.paths,
    arbiters,
    removedEdges,
    inserted,
    crossbarPorts: ports,
    crossbarBandwidth: { before, after: crossbarBandwidth(current, aggregated, crossbar.id) },
  };

  EngineLogger.optimized(result.dedicated.length, arbiters.length, removedEdges.length, ports);
  return result;
}
