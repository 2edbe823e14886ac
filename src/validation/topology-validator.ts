/**
 * Topology Validator
 *
 * Pure structural, capacity, bandwidth and latency checks over a TopologyGraph.
 * Each rule sees the full node/edge set independently. Findings come back
 * ordered by rule, then node id or edge order. The graph is never mutated.
 */

import { DEFAULT_ENGINE_CONFIG } from '../shared/config.js';
import {
  BandwidthError,
  CapacityError,
  ConfigError,
  LatencyError,
  StructuralError,
  type TopologyError,
} from '../shared/errors.js';
import {
  assertNever,
  MAX_ARBITER_INPUTS,
  MAX_DECODER_OUTPUTS,
  type NodeId,
  type TopologyEdge,
  type TopologyNode,
  type TrafficFlow,
} from '../shared/types/topology.js';
import { isSupportedWidth } from '../shared/utils/width.js';
import { shortestPath, weaklyConnectedComponents } from '../graph-engine/graph-analysis.js';
import { declaredWidths, nodeLatency, portDomain, portWidth } from '../graph-engine/node-ports.js';
import type { TopologyGraph } from '../graph-engine/topology-graph.js';
import {
  BANDWIDTH_TOLERANCE,
  BANDWIDTH_WARNING_RATIO,
  type TopologyValidationResult,
  type ValidateOptions,
  type ValidationFinding,
  type ValidationRuleId,
} from './types.js';

function edgeError(
  rule: ValidationRuleId,
  errorType: ValidationFinding['errorType'],
  edge: TopologyEdge,
  message: string
): ValidationFinding {
  return {
    rule,
    severity: 'error',
    errorType,
    message,
    nodeIds: [edge.src, edge.dst],
    edge: { src: edge.src, dst: edge.dst },
  };
}

function label(node: TopologyNode): string {
  return `${node.kind} '${node.name}' (${node.id})`;
}

/**
 * Rule 1: Initiators and Targets attach to the fabric only through an NIU
 */
export function checkNiuEntry(graph: TopologyGraph, niuEntryOnly: boolean): ValidationFinding[] {
  const findings: ValidationFinding[] = [];

  for (const node of graph.nodes) {
    if (node.kind !== 'Initiator' && node.kind !== 'Target') continue;

    if (graph.degree(node.id, 'both') === 0) {
      findings.push({
        rule: 'unconnected-endpoint',
        severity: 'warning',
        errorType: 'StructuralError',
        message: `${label(node)} has no connections`,
        nodeIds: [node.id],
      });
      continue;
    }

    if (!niuEntryOnly) continue;

    for (const edge of [...graph.outgoing(node.id), ...graph.incoming(node.id)]) {
      const otherId = edge.src === node.id ? edge.dst : edge.src;
      const other = graph.requireNode(otherId);
      if (other.kind !== 'NIU') {
        findings.push(
          edgeError('niu-entry', 'StructuralError', edge, `${label(node)} connects to ${label(other)} instead of an NIU`)
        );
      }
    }
  }

  return findings;
}

/**
 * Rule 2a: every declared and carried width is a supported bus width
 */
export function checkWidthSupport(graph: TopologyGraph): ValidationFinding[] {
  const findings: ValidationFinding[] = [];

  for (const node of graph.nodes) {
    for (const width of declaredWidths(node)) {
      if (!isSupportedWidth(width)) {
        findings.push({
          rule: 'width-support',
          severity: 'error',
          errorType: 'ConfigError',
          message: `${label(node)} declares unsupported width ${width}`,
          nodeIds: [node.id],
        });
      }
    }
  }

  for (const edge of graph.edges) {
    if (!isSupportedWidth(edge.width)) {
      findings.push(
        edgeError('width-support', 'ConfigError', edge, `Edge ${edge.src}->${edge.dst} carries unsupported width ${edge.width}`)
      );
    }
  }

  return findings;
}

/**
 * Endpoints whose output/input widths differ across an edge without a WidthConverter
 */
export function checkEndpointWidths(graph: TopologyGraph): ValidationFinding[] {
  const findings: ValidationFinding[] = [];

  for (const edge of graph.edges) {
    const u = graph.requireNode(edge.src);
    const v = graph.requireNode(edge.dst);
    if (u.kind === 'WidthConverter' || v.kind === 'WidthConverter') continue;

    const from = portWidth(u, 'out');
    const to = portWidth(v, 'in');
    if (from !== undefined && to !== undefined && from !== to) {
      findings.push(
        edgeError('width-match', 'StructuralError', edge, `Width mismatch ${label(u)} ${from}-bit -> ${label(v)} ${to}-bit`)
      );
    }
  }

  return findings;
}

/**
 * Rule 2b: endpoint widths agree with each other and with the edge
 */
export function checkWidthMatch(graph: TopologyGraph): ValidationFinding[] {
  const findings = checkEndpointWidths(graph);
  const flagged = new Set(findings.map((f) => `${f.edge?.src}->${f.edge?.dst}`));

  for (const edge of graph.edges) {
    if (flagged.has(`${edge.src}->${edge.dst}`)) continue;
    const u = graph.requireNode(edge.src);
    const v = graph.requireNode(edge.dst);
    if (u.kind === 'WidthConverter' || v.kind === 'WidthConverter') continue;

    const declared = portWidth(u, 'out') ?? portWidth(v, 'in');
    if (declared !== undefined && declared !== edge.width) {
      findings.push(
        edgeError(
          'width-match',
          'StructuralError',
          edge,
          `Edge ${edge.src}->${edge.dst} carries ${edge.width}-bit but its endpoints are ${declared}-bit`
        )
      );
    }
  }

  // keep edge order
  const order = new Map(graph.edges.map((edge, index) => [`${edge.src}->${edge.dst}`, index]));
  return findings.sort(
    (a, b) =>
      (order.get(`${a.edge?.src}->${a.edge?.dst}`) ?? 0) - (order.get(`${b.edge?.src}->${b.edge?.dst}`) ?? 0)
  );
}

/**
 * Rule 3: clock domains agree across edges without a ClockConverter
 */
export function checkClockDomains(graph: TopologyGraph): ValidationFinding[] {
  const findings: ValidationFinding[] = [];

  for (const edge of graph.edges) {
    const u = graph.requireNode(edge.src);
    const v = graph.requireNode(edge.dst);
    if (u.kind === 'ClockConverter' || v.kind === 'ClockConverter') continue;

    const from = portDomain(u, 'out');
    const to = portDomain(v, 'in');
    if (from !== undefined && to !== undefined && from !== to) {
      findings.push(
        edgeError('clock-domain', 'StructuralError', edge, `Clock domain crossing ${label(u)} '${from}' -> ${label(v)} '${to}' without a ClockConverter`)
      );
    }
  }

  return findings;
}

/**
 * Rules 4 and 5: arbiter fan-in, decoder fan-out, router ports
 */
export function checkCapacity(graph: TopologyGraph): ValidationFinding[] {
  const fanIn: ValidationFinding[] = [];
  const fanOut: ValidationFinding[] = [];
  const ports: ValidationFinding[] = [];

  const capacity = (rule: ValidationRuleId, node: TopologyNode, message: string): ValidationFinding => ({
    rule,
    severity: 'error',
    errorType: 'CapacityError',
    message,
    nodeIds: [node.id],
  });

  for (const node of graph.nodes) {
    switch (node.kind) {
      case 'Arbiter': {
        const inDegree = graph.degree(node.id, 'in');
        if (node.numInputs > MAX_ARBITER_INPUTS) {
          fanIn.push(capacity('arbiter-fan-in', node, `${label(node)} declares ${node.numInputs} inputs (max ${MAX_ARBITER_INPUTS})`));
        }
        if (inDegree !== node.numInputs) {
          fanIn.push(capacity('arbiter-fan-in', node, `${label(node)} declares ${node.numInputs} inputs but has in-degree ${inDegree}`));
        }
        break;
      }
      case 'Decoder': {
        const outDegree = graph.degree(node.id, 'out');
        if (node.numOutputs > MAX_DECODER_OUTPUTS) {
          fanOut.push(capacity('decoder-fan-out', node, `${label(node)} declares ${node.numOutputs} outputs (max ${MAX_DECODER_OUTPUTS})`));
        }
        if (outDegree !== node.numOutputs) {
          fanOut.push(capacity('decoder-fan-out', node, `${label(node)} declares ${node.numOutputs} outputs but has out-degree ${outDegree}`));
        }
        break;
      }
      case 'Router': {
        const used = graph.neighbors(node.id, 'both').length;
        if (used > node.numPorts) {
          ports.push(capacity('router-ports', node, `${label(node)} has ${node.numPorts} ports but ${used} distinct neighbours`));
        }
        break;
      }
      default:
        break;
    }
  }

  return [...fanIn, ...fanOut, ...ports];
}

/**
 * Rule 6: guaranteed bandwidth into each Target
 */
export function checkTargetBandwidth(
  graph: TopologyGraph,
  flows: readonly TrafficFlow[]
): ValidationFinding[] {
  const demand = new Map<NodeId, number>();
  for (const flow of flows) {
    demand.set(flow.dst, (demand.get(flow.dst) ?? 0) + flow.bandwidth);
  }

  const findings: ValidationFinding[] = [];
  for (const target of graph.find('Target')) {
    const required = demand.get(target.id);
    if (required === undefined) continue;

    const capacity = target.maxBandwidth * (1 + BANDWIDTH_TOLERANCE);
    const percent = ((required / target.maxBandwidth) * 100).toFixed(1);
    if (required > capacity) {
      findings.push({
        rule: 'target-bandwidth',
        severity: 'error',
        errorType: 'BandwidthError',
        message: `${label(target)} oversubscribed: ${required} GB/s of ${target.maxBandwidth} GB/s (${percent}%)`,
        nodeIds: [target.id],
      });
    } else if (required > capacity * BANDWIDTH_WARNING_RATIO) {
      findings.push({
        rule: 'target-bandwidth',
        severity: 'warning',
        errorType: 'BandwidthError',
        message: `${label(target)} at ${percent}% of ${target.maxBandwidth} GB/s`,
        nodeIds: [target.id],
      });
    }
  }
  return findings;
}

/**
 * Latency of a node path: edge latencies plus node access latencies
 */
export function pathLatency(graph: TopologyGraph, path: readonly NodeId[]): number {
  let total = 0;
  for (let i = 0; i < path.length; i++) {
    total += nodeLatency(graph.requireNode(path[i]));
    if (i > 0) {
      total += graph.edge(path[i - 1], path[i])?.latency ?? 0;
    }
  }
  return total;
}

/**
 * Rule 7: every flow has a realized path within its Initiator's latency budget
 */
export function checkFlows(graph: TopologyGraph, flows: readonly TrafficFlow[]): ValidationFinding[] {
  const endpoints: ValidationFinding[] = [];
  const latency: ValidationFinding[] = [];

  flows.forEach((flow, index) => {
    const src = graph.node(flow.src);
    const dst = graph.node(flow.dst);

    if (!src || src.kind !== 'Initiator' || !dst || dst.kind !== 'Target') {
      endpoints.push({
        rule: 'flow-endpoints',
        severity: 'error',
        errorType: 'StructuralError',
        message: `Flow #${index} (${flow.src}->${flow.dst}) must run from an Initiator to a Target`,
        nodeIds: [flow.src, flow.dst],
      });
      return;
    }

    const path = shortestPath(graph, src.id, dst.id);
    if (!path) {
      endpoints.push({
        rule: 'flow-endpoints',
        severity: 'error',
        errorType: 'StructuralError',
        message: `Flow #${index}: ${label(dst)} is unreachable from ${label(src)}`,
        nodeIds: [src.id, dst.id],
      });
      return;
    }

    const total = pathLatency(graph, path);
    if (total > src.latencyRequirement) {
      latency.push({
        rule: 'flow-latency',
        severity: 'error',
        errorType: 'LatencyError',
        message: `Flow #${index} ${src.name}->${dst.name}: path latency ${total} exceeds requirement ${src.latencyRequirement} cycles`,
        nodeIds: path,
      });
    }
  });

  return [...endpoints, ...latency];
}

/**
 * Converters that convert nothing
 */
export function checkRedundantConverters(graph: TopologyGraph): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  for (const node of graph.nodes) {
    const redundant =
      (node.kind === 'ClockConverter' && node.srcClockDomain === node.dstClockDomain) ||
      (node.kind === 'WidthConverter' && node.srcWidth === node.dstWidth);
    if (redundant) {
      findings.push({
        rule: 'redundant-converter',
        severity: 'warning',
        errorType: 'StructuralError',
        message: `${label(node)} converts between identical ${node.kind === 'ClockConverter' ? 'domains' : 'widths'}`,
        nodeIds: [node.id],
      });
    }
  }
  return findings;
}

export function checkConnectivity(graph: TopologyGraph): ValidationFinding[] {
  const components = weaklyConnectedComponents(graph);
  if (components.length <= 1) return [];
  return [
    {
      rule: 'disconnected-component',
      severity: 'warning',
      errorType: 'StructuralError',
      message: `Topology splits into ${components.length} disconnected components`,
      nodeIds: components.map((component) => component[0]),
    },
  ];
}

/**
 * Run every rule and split findings by severity
 */
export function validateTopology(
  graph: TopologyGraph,
  options: ValidateOptions = {}
): TopologyValidationResult {
  const flows = options.flows ?? [];
  const niuEntryOnly = options.niuEntryOnly ?? DEFAULT_ENGINE_CONFIG.niuEntryOnly;

  const findings: ValidationFinding[] = [
    ...checkNiuEntry(graph, niuEntryOnly),
    ...checkWidthSupport(graph),
    ...checkWidthMatch(graph),
    ...checkClockDomains(graph),
    ...checkCapacity(graph),
    ...checkTargetBandwidth(graph, flows),
    ...checkFlows(graph, flows),
    ...checkRedundantConverters(graph),
    ...checkConnectivity(graph),
  ];

  const errors = findings.filter((f) => f.severity === 'error');
  const warnings = findings.filter((f) => f.severity === 'warning');

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Thrown counterpart of a finding, for callers that fail fast
 */
export function findingToError(finding: ValidationFinding): TopologyError {
  switch (finding.errorType) {
    case 'StructuralError':
      return new StructuralError(finding.message, finding.nodeIds);
    case 'ConfigError':
      return new ConfigError(finding.message, finding.nodeIds);
    case 'CapacityError':
      return new CapacityError(finding.message, finding.nodeIds);
    case 'BandwidthError':
      return new BandwidthError(finding.message, finding.nodeIds);
    case 'LatencyError':
      return new LatencyError(finding.message, finding.nodeIds);
    default:
      return assertNever(finding.errorType);
  }
}
