/**
 * Topology Generator
 *
 * Builds the baseline full-crossbar topology from a requirements description:
 *   Initiator -> NIU -> Crossbar -> NIU -> Target
 *
 * NIU widths come from the endpoint bandwidth and its domain frequency;
 * the crossbar takes the widest NIU width and runs in the fast domain.
 * optimizeFor does not change this baseline.
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import { EngineLogger } from '../shared/logger.js';
import type { Requirements } from '../shared/types/requirements.js';
import type {
  NodeId,
  NodeKind,
  TopologyEdge,
  TopologyNode,
  TrafficFlow,
} from '../shared/types/topology.js';
import { deriveWidth } from '../shared/utils/width.js';
import { TopologyGraph } from '../graph-engine/topology-graph.js';
import {
  CROSSBAR_LINK_LATENCY,
  CROSSBAR_NAME,
  INITIATOR_NIU_LATENCY,
  TARGET_NIU_LATENCY_DIVISOR,
  type DerivedWidth,
  type GeneratedTopology,
  type SynthesisReport,
} from './types.js';

/**
 * fast when bandwidth >= threshold, else slow
 */
export function assignClockDomain(bandwidth: number, config: EngineConfig = DEFAULT_ENGINE_CONFIG): string {
  return bandwidth >= config.fastDomainThreshold ? config.fastDomainName : config.slowDomainName;
}

function checkRequirements(requirements: Requirements): void {
  if (requirements.initiators.length === 0) {
    throw new ConfigError('Requirements declare no initiators');
  }
  if (requirements.targets.length === 0) {
    throw new ConfigError('Requirements declare no targets');
  }

  const names = new Set<string>();
  for (const { name } of [...requirements.initiators, ...requirements.targets]) {
    if (names.has(name)) {
      throw new ConfigError(`Duplicate endpoint name '${name}'`);
    }
    names.add(name);
  }

  for (const init of requirements.initiators) {
    if (!(init.maxThroughput > 0) || !(init.avgThroughput > 0)) {
      throw new ConfigError(`Initiator '${init.name}': throughput must be > 0 GB/s`);
    }
  }
  for (const tgt of requirements.targets) {
    if (!(tgt.maxBandwidth > 0)) {
      throw new ConfigError(`Target '${tgt.name}': maxBandwidth must be > 0 GB/s, got ${tgt.maxBandwidth}`);
    }
  }

  const domains = new Set<string>();
  for (const domain of requirements.clockDomains) {
    if (!(domain.frequency > 0)) {
      throw new ConfigError(`Clock domain '${domain.name}': frequency must be > 0 MHz, got ${domain.frequency}`);
    }
    if (domains.has(domain.name)) {
      throw new ConfigError(`Duplicate clock domain '${domain.name}'`);
    }
    domains.add(domain.name);
  }

  requirements.trafficFlows.forEach((flow, index) => {
    if (!(flow.bandwidth > 0)) {
      throw new ConfigError(`Flow #${index} ${flow.src}->${flow.dst}: bandwidth must be > 0 GB/s`);
    }
  });
}

/**
 * Build the full-crossbar baseline
 *
 * @throws ConfigError on invalid requirement values
 */
export function generateTopology(
  requirements: Requirements,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): GeneratedTopology {
  checkRequirements(requirements);

  const frequencies = new Map(requirements.clockDomains.map((d) => [d.name, d.frequency]));
  const frequencyOf = (domain: string): number => frequencies.get(domain) ?? config.defaultFrequencyMhz;

  const nodes: TopologyNode[] = [];
  const edges: TopologyEdge[] = [];
  const widths: DerivedWidth[] = [];
  const initiatorIds = new Map<string, NodeId>();
  const targetIds = new Map<string, NodeId>();
  let nextId = 0;

  // 1. Initiators and their NIUs
  for (const init of requirements.initiators) {
    const id = nextId++;
    const niuId = nextId++;
    const clockDomain = assignClockDomain(init.maxThroughput, config);
    const frequency = frequencyOf(clockDomain);
    const width = deriveWidth(init.maxThroughput, frequency, `Initiator '${init.name}'`);

    nodes.push({
      kind: 'Initiator',
      id,
      name: init.name,
      avgThroughput: init.avgThroughput,
      maxThroughput: init.maxThroughput,
      latencyRequirement: init.latencyRequirement,
      priority: init.priority,
      trafficPattern: init.trafficPattern ?? 'bursty',
    });
    nodes.push({ kind: 'NIU', id: niuId, name: `${init.name}_NIU`, width, clockDomain });
    edges.push({ src: id, dst: niuId, width, latency: INITIATOR_NIU_LATENCY });

    initiatorIds.set(init.name, id);
    widths.push({ name: init.name, role: 'initiator', niuId, bandwidth: init.maxThroughput, frequency, width, clockDomain });
  }

  // 2. Targets and their NIUs
  for (const tgt of requirements.targets) {
    const id = nextId++;
    const niuId = nextId++;
    const clockDomain = assignClockDomain(tgt.maxBandwidth, config);
    const frequency = frequencyOf(clockDomain);
    const width = deriveWidth(tgt.maxBandwidth, frequency, `Target '${tgt.name}'`);

    nodes.push({
      kind: 'Target',
      id,
      name: tgt.name,
      maxBandwidth: tgt.maxBandwidth,
      latency: tgt.latency,
      size: tgt.size,
    });
    nodes.push({ kind: 'NIU', id: niuId, name: `${tgt.name}_NIU`, width, clockDomain });
    edges.push({
      src: niuId,
      dst: id,
      width,
      latency: Math.floor(tgt.latency / TARGET_NIU_LATENCY_DIVISOR),
    });

    targetIds.set(tgt.name, id);
    widths.push({ name: tgt.name, role: 'target', niuId, bandwidth: tgt.maxBandwidth, frequency, width, clockDomain });
  }

  // 3. Crossbar, fully connected
  const crossbar = {
    id: nextId++,
    name: CROSSBAR_NAME,
    width: Math.max(...widths.map((w) => w.width)),
    numPorts: requirements.initiators.length + requirements.targets.length,
    clockDomain: config.fastDomainName,
  };
  nodes.push({ kind: 'Router', role: 'crossbar', ...crossbar });

  for (const entry of widths) {
    if (entry.role === 'initiator') {
      edges.push({ src: entry.niuId, dst: crossbar.id, width: entry.width, latency: CROSSBAR_LINK_LATENCY });
    }
  }
  for (const entry of widths) {
    if (entry.role === 'target') {
      edges.push({ src: crossbar.id, dst: entry.niuId, width: entry.width, latency: CROSSBAR_LINK_LATENCY });
    }
  }

  // 4. Flows by id
  const flows: TrafficFlow[] = requirements.trafficFlows.map((flow, index) => {
    const src = initiatorIds.get(flow.src);
    const dst = targetIds.get(flow.dst);
    if (src === undefined) {
      throw new ConfigError(`Flow #${index}: unknown initiator '${flow.src}'`);
    }
    if (dst === undefined) {
      throw new ConfigError(`Flow #${index}: unknown target '${flow.dst}'`);
    }
    return { src, dst, bandwidth: flow.bandwidth, maxLatency: flow.maxLatency, priority: flow.priority };
  });

  const graph = TopologyGraph.create(nodes, edges);
  const report = buildSynthesisReport(graph, requirements, widths, crossbar);

  EngineLogger.topologyGenerated(
    requirements.initiators.length,
    requirements.targets.length,
    graph.nodeCount,
    graph.edgeCount,
    crossbar.width
  );

  return { graph, flows, report };
}

export function countNodeKinds(graph: TopologyGraph): Record<NodeKind, number> {
  const counts: Record<NodeKind, number> = {
    Initiator: 0,
    Target: 0,
    NIU: 0,
    Router: 0,
    Arbiter: 0,
    Decoder: 0,
    ClockConverter: 0,
    WidthConverter: 0,
  };
  for (const node of graph.nodes) {
    counts[node.kind] += 1;
  }
  return counts;
}

function buildSynthesisReport(
  graph: TopologyGraph,
  requirements: Requirements,
  widths: DerivedWidth[],
  crossbar: SynthesisReport['crossbar']
): SynthesisReport {
  const required = requirements.trafficFlows.reduce((sum, flow) => sum + flow.bandwidth, 0);
  const capacity = requirements.targets.reduce((sum, tgt) => sum + tgt.maxBandwidth, 0);

  return {
    nodeCounts: countNodeKinds(graph),
    edgeCount: graph.edgeCount,
    initiatorCount: requirements.initiators.length,
    targetCount: requirements.targets.length,
    widths,
    crossbar,
    bandwidth: {
      required,
      capacity,
      utilization: capacity > 0 ? required / capacity : 0,
    },
  };
}
