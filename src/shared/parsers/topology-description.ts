/**
 * Topology / Requirements Description Codec
 *
 * Maps already-deserialized description records (snake_case fields, as found
 * in topology files) to the typed model and back. Record shapes are checked
 * with zod; anything the schema rejects becomes a ConfigError.
 */

import { z } from 'zod';
import { TopologyGraph } from '../../graph-engine/topology-graph.js';
import { ConfigError, StructuralError } from '../errors.js';
import type { Requirements } from '../types/requirements.js';
import {
  assertNever,
  type ClockDomain,
  type TopologyEdge,
  type TopologyNode,
  type TrafficFlow,
} from '../types/topology.js';

/**
 * Copy `from` into `to` when only `from` is present
 */
function alias(from: string, to: string) {
  return (value: unknown): unknown => {
    if (typeof value !== 'object' || value === null) return value;
    const record: Record<string, unknown> = { ...value };
    if (!(to in record) && from in record) {
      record[to] = record[from];
    }
    return record;
  };
}

// ============================================================================
// Schemas
// ============================================================================

const id = z.number().int().nonnegative();
const domainName = z.string().min(1);
const gbps = z.number().positive();
const cycles = z.number().nonnegative();

const InitiatorRecord = z.object({
  type: z.literal('Initiator'),
  id,
  name: z.string(),
  avg_throughput: gbps,
  max_throughput: gbps,
  latency_requirement: cycles,
  priority: z.number().int().default(0),
  traffic_pattern: z.enum(['bursty', 'streaming', 'uniform']).default('bursty'),
});

const TargetRecord = z.object({
  type: z.literal('Target'),
  id,
  name: z.string(),
  max_bandwidth: gbps,
  latency: cycles,
  size: z.number().default(0),
});

const NiuRecord = z.object({
  type: z.literal('NIU'),
  id,
  name: z.string(),
  width: z.number().int(),
  clock_domain: domainName,
});

const RouterRecord = z.object({
  type: z.literal('Router'),
  id,
  name: z.string(),
  width: z.number().int(),
  clock_domain: domainName,
  num_ports: z.number().int().nonnegative(),
  role: z.enum(['crossbar', 'dedicated']).optional(),
});

const ArbiterRecord = z.object({
  type: z.literal('Arbiter'),
  id,
  name: z.string(),
  num_inputs: z.number().int().nonnegative(),
  width: z.number().int(),
  policy: z.enum(['priority', 'round_robin', 'weighted']),
  clock_domain: domainName.optional(),
  grant_order: z.array(id).optional(),
});

const DecoderRecord = z.object({
  type: z.literal('Decoder'),
  id,
  name: z.string(),
  num_outputs: z.number().int().nonnegative(),
  width: z.number().int(),
  clock_domain: domainName.optional(),
});

const ClockConverterRecord = z.object({
  type: z.literal('ClockConverter'),
  id,
  name: z.string(),
  width: z.number().int(),
  src_clock_domain: domainName,
  dst_clock_domain: domainName,
});

const WidthConverterRecord = z.object({
  type: z.literal('WidthConverter'),
  id,
  name: z.string(),
  src_width: z.number().int(),
  dst_width: z.number().int(),
  clock_domain: domainName,
});

export const NodeRecordSchema = z.preprocess(
  alias('kind', 'type'),
  z.discriminatedUnion('type', [
    InitiatorRecord,
    TargetRecord,
    NiuRecord,
    RouterRecord,
    ArbiterRecord,
    DecoderRecord,
    ClockConverterRecord,
    WidthConverterRecord,
  ])
);

export const EdgeRecordSchema = z.object({
  src: id,
  dst: id,
  width: z.number().int().positive(),
  latency: z.number().int().nonnegative(),
});

export const ClockDomainRecordSchema = z.object({
  name: domainName,
  frequency: z.number().positive(),
});

export const FlowRecordSchema = z.object({
  src: id,
  dst: id,
  bandwidth: gbps,
  max_latency: cycles,
  priority: z.number().int().default(0),
});

export const TopologyDescriptionSchema = z.object({
  network: z.string().default('noc'),
  num_nodes: z.number().int().nonnegative().optional(),
  nodes: z.array(NodeRecordSchema),
  graph: z.object({ edges: z.array(EdgeRecordSchema).default([]) }).default({}),
  constraints: z
    .object({
      clock_domains: z.array(ClockDomainRecordSchema).default([]),
      bandwidth_allocation: z.array(FlowRecordSchema).default([]),
      niu_entry_only: z.boolean().optional(),
    })
    .default({}),
});

export const RequirementsSchema = z.object({
  initiators: z.array(
    z.preprocess(
      alias('latency_req', 'latency_requirement'),
      z.object({
        name: z.string().min(1),
        type: z.string().optional(),
        avg_throughput: gbps,
        max_throughput: gbps,
        latency_requirement: cycles,
        priority: z.number().int().default(0),
        traffic_pattern: z.enum(['bursty', 'streaming', 'uniform']).optional(),
      })
    )
  ),
  targets: z.array(
    z.object({
      name: z.string().min(1),
      type: z.string().optional(),
      max_bandwidth: gbps,
      latency: cycles,
      size: z.number().default(0),
    })
  ),
  traffic_flows: z
    .array(
      z.object({
        src: z.string(),
        dst: z.string(),
        bandwidth: gbps,
        max_latency: cycles,
        priority: z.number().int().default(0),
      })
    )
    .default([]),
  constraints: z.object({ clock_domains: z.array(ClockDomainRecordSchema).default([]) }).default({}),
  optimize_for: z.enum(['bandwidth', 'latency', 'none']).default('bandwidth'),
});

export type NodeRecord = z.infer<typeof NodeRecordSchema>;
export type TopologyDescriptionRecord = z.infer<typeof TopologyDescriptionSchema>;
export type RequirementsRecord = z.infer<typeof RequirementsSchema>;

// ============================================================================
// Model mapping
// ============================================================================

export interface TopologyDescription {
  network: string;
  graph: TopologyGraph;
  clockDomains: ClockDomain[];
  flows: TrafficFlow[];
  /** Present only when the record sets it */
  niuEntryOnly?: boolean;
}

function schemaError(what: string, error: z.ZodError): ConfigError {
  const details = error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
  return new ConfigError(`Invalid ${what}: ${details.join('; ')}`);
}

function toNode(record: NodeRecord): TopologyNode {
  switch (record.type) {
    case 'Initiator':
      return {
        kind: 'Initiator',
        id: record.id,
        name: record.name,
        avgThroughput: record.avg_throughput,
        maxThroughput: record.max_throughput,
        latencyRequirement: record.latency_requirement,
        priority: record.priority,
        trafficPattern: record.traffic_pattern,
      };
    case 'Target':
      return {
        kind: 'Target',
        id: record.id,
        name: record.name,
        maxBandwidth: record.max_bandwidth,
        latency: record.latency,
        size: record.size,
      };
    case 'NIU':
      return { kind: 'NIU', id: record.id, name: record.name, width: record.width, clockDomain: record.clock_domain };
    case 'Router':
      return {
        kind: 'Router',
        id: record.id,
        name: record.name,
        width: record.width,
        clockDomain: record.clock_domain,
        numPorts: record.num_ports,
        role: record.role,
      };
    case 'Arbiter':
      return {
        kind: 'Arbiter',
        id: record.id,
        name: record.name,
        numInputs: record.num_inputs,
        width: record.width,
        policy: record.policy,
        clockDomain: record.clock_domain,
        grantOrder: record.grant_order,
      };
    case 'Decoder':
      return {
        kind: 'Decoder',
        id: record.id,
        name: record.name,
        numOutputs: record.num_outputs,
        width: record.width,
        clockDomain: record.clock_domain,
      };
    case 'ClockConverter':
      return {
        kind: 'ClockConverter',
        id: record.id,
        name: record.name,
        width: record.width,
        srcClockDomain: record.src_clock_domain,
        dstClockDomain: record.dst_clock_domain,
      };
    case 'WidthConverter':
      return {
        kind: 'WidthConverter',
        id: record.id,
        name: record.name,
        srcWidth: record.src_width,
        dstWidth: record.dst_width,
        clockDomain: record.clock_domain,
      };
    default:
      return assertNever(record);
  }
}

function toNodeRecord(node: TopologyNode): NodeRecord {
  switch (node.kind) {
    case 'Initiator':
      return {
        type: 'Initiator',
        id: node.id,
        name: node.name,
        avg_throughput: node.avgThroughput,
        max_throughput: node.maxThroughput,
        latency_requirement: node.latencyRequirement,
        priority: node.priority,
        traffic_pattern: node.trafficPattern,
      };
    case 'Target':
      return {
        type: 'Target',
        id: node.id,
        name: node.name,
        max_bandwidth: node.maxBandwidth,
        latency: node.latency,
        size: node.size,
      };
    case 'NIU':
      return { type: 'NIU', id: node.id, name: node.name, width: node.width, clock_domain: node.clockDomain };
    case 'Router':
      return {
        type: 'Router',
        id: node.id,
        name: node.name,
        width: node.width,
        clock_domain: node.clockDomain,
        num_ports: node.numPorts,
        ...(node.role ? { role: node.role } : {}),
      };
    case 'Arbiter':
      return {
        type: 'Arbiter',
        id: node.id,
        name: node.name,
        num_inputs: node.numInputs,
        width: node.width,
        policy: node.policy,
        ...(node.clockDomain ? { clock_domain: node.clockDomain } : {}),
        ...(node.grantOrder ? { grant_order: [...node.grantOrder] } : {}),
      };
    case 'Decoder':
      return {
        type: 'Decoder',
        id: node.id,
        name: node.name,
        num_outputs: node.numOutputs,
        width: node.width,
        ...(node.clockDomain ? { clock_domain: node.clockDomain } : {}),
      };
    case 'ClockConverter':
      return {
        type: 'ClockConverter',
        id: node.id,
        name: node.name,
        width: node.width,
        src_clock_domain: node.srcClockDomain,
        dst_clock_domain: node.dstClockDomain,
      };
    case 'WidthConverter':
      return {
        type: 'WidthConverter',
        id: node.id,
        name: node.name,
        src_width: node.srcWidth,
        dst_width: node.dstWidth,
        clock_domain: node.clockDomain,
      };
    default:
      return assertNever(node);
  }
}

/**
 * Build a graph (plus domains and flows) from a topology description record
 *
 * @throws ConfigError when the record does not match the schema
 * @throws StructuralError for a num_nodes mismatch or broken references
 */
export function parseTopologyDescription(record: unknown): TopologyDescription {
  const parsed = TopologyDescriptionSchema.safeParse(record);
  if (!parsed.success) {
    throw schemaError('topology description', parsed.error);
  }
  const data = parsed.data;

  if (data.num_nodes !== undefined && data.num_nodes !== data.nodes.length) {
    throw new StructuralError(`num_nodes is ${data.num_nodes} but ${data.nodes.length} nodes are listed`);
  }

  const edges: TopologyEdge[] = data.graph.edges.map((edge) => ({ ...edge }));
  const graph = TopologyGraph.create(data.nodes.map(toNode), edges);

  return {
    network: data.network,
    graph,
    clockDomains: data.constraints.clock_domains.map((d) => ({ name: d.name, frequency: d.frequency })),
    flows: data.constraints.bandwidth_allocation.map((flow) => ({
      src: flow.src,
      dst: flow.dst,
      bandwidth: flow.bandwidth,
      maxLatency: flow.max_latency,
      priority: flow.priority,
    })),
    ...(data.constraints.niu_entry_only === undefined ? {} : { niuEntryOnly: data.constraints.niu_entry_only }),
  };
}

export interface DescriptionContext {
  network?: string;
  clockDomains?: readonly ClockDomain[];
  flows?: readonly TrafficFlow[];
  niuEntryOnly?: boolean;
}

/**
 * Inverse of parseTopologyDescription
 */
export function toTopologyDescription(
  graph: TopologyGraph,
  context: DescriptionContext = {}
): TopologyDescriptionRecord {
  return {
    network: context.network ?? 'noc',
    num_nodes: graph.nodeCount,
    nodes: graph.nodes.map(toNodeRecord),
    graph: {
      edges: graph.edges.map((edge) => ({ src: edge.src, dst: edge.dst, width: edge.width, latency: edge.latency })),
    },
    constraints: {
      clock_domains: (context.clockDomains ?? []).map((d) => ({ name: d.name, frequency: d.frequency })),
      bandwidth_allocation: (context.flows ?? []).map((flow) => ({
        src: flow.src,
        dst: flow.dst,
        bandwidth: flow.bandwidth,
        max_latency: flow.maxLatency,
        priority: flow.priority,
      })),
      ...(context.niuEntryOnly === undefined ? {} : { niu_entry_only: context.niuEntryOnly }),
    },
  };
}

/**
 * Map a requirements record to Generator input
 *
 * @throws ConfigError when the record does not match the schema
 */
export function parseRequirements(record: unknown): Requirements {
  const parsed = RequirementsSchema.safeParse(record);
  if (!parsed.success) {
    throw schemaError('requirements', parsed.error);
  }
  const data = parsed.data;

  return {
    initiators: data.initiators.map((init) => ({
      name: init.name,
      type: init.type,
      avgThroughput: init.avg_throughput,
      maxThroughput: init.max_throughput,
      latencyRequirement: init.latency_requirement,
      priority: init.priority,
      trafficPattern: init.traffic_pattern,
    })),
    targets: data.targets.map((tgt) => ({
      name: tgt.name,
      type: tgt.type,
      maxBandwidth: tgt.max_bandwidth,
      latency: tgt.latency,
      size: tgt.size,
    })),
    trafficFlows: data.traffic_flows.map((flow) => ({
      src: flow.src,
      dst: flow.dst,
      bandwidth: flow.bandwidth,
      maxLatency: flow.max_latency,
      priority: flow.priority,
    })),
    clockDomains: data.constraints.clock_domains.map((d) => ({ name: d.name, frequency: d.frequency })),
    optimizeFor: data.optimize_for,
  };
}
