/**
 * Unit Tests - Topology / Requirements Description Codec
 */

import { describe, it, expect } from 'vitest';
import { TopologyGraph } from '../../../src/graph-engine/topology-graph.js';
import { ConfigError, StructuralError } from '../../../src/shared/errors.js';
import {
  parseRequirements,
  parseTopologyDescription,
  toTopologyDescription,
} from '../../../src/shared/parsers/topology-description.js';
import { edge, niu, router } from '../../setup.js';

function record() {
  return {
    network: 'soc',
    num_nodes: 3,
    nodes: [
      { type: 'Initiator', id: 0, name: 'CPU', avg_throughput: 1, max_throughput: 2, latency_requirement: 50 },
      { kind: 'NIU', id: 1, name: 'CPU_NIU', width: 64, clock_domain: 'fast' },
      { type: 'Target', id: 2, name: 'MEM', max_bandwidth: 16, latency: 20 },
    ],
    graph: {
      edges: [
        { src: 0, dst: 1, width: 64, latency: 1 },
        { src: 1, dst: 2, width: 64, latency: 2 },
      ],
    },
    constraints: {
      clock_domains: [{ name: 'fast', frequency: 2000 }],
      bandwidth_allocation: [{ src: 0, dst: 2, bandwidth: 4, max_latency: 50 }],
      niu_entry_only: false,
    },
  };
}

describe('parseTopologyDescription', () => {
  it('should map snake_case records onto typed nodes', () => {
    const description = parseTopologyDescription(record());

    expect(description.network).toBe('soc');
    expect(description.graph.nodes).toEqual([
      {
        kind: 'Initiator',
        id: 0,
        name: 'CPU',
        avgThroughput: 1,
        maxThroughput: 2,
        latencyRequirement: 50,
        priority: 0,
        trafficPattern: 'bursty',
      },
      { kind: 'NIU', id: 1, name: 'CPU_NIU', width: 64, clockDomain: 'fast' },
      { kind: 'Target', id: 2, name: 'MEM', maxBandwidth: 16, latency: 20, size: 0 },
    ]);
    expect(description.graph.edges).toHaveLength(2);
  });

  it('should read constraints', () => {
    const description = parseTopologyDescription(record());

    expect(description.clockDomains).toEqual([{ name: 'fast', frequency: 2000 }]);
    expect(description.flows).toEqual([{ src: 0, dst: 2, bandwidth: 4, maxLatency: 50, priority: 0 }]);
    expect(description.niuEntryOnly).toBe(false);
  });

  it('should default missing sections', () => {
    const description = parseTopologyDescription({ nodes: [{ type: 'NIU', id: 4, name: 'N', width: 32, clock_domain: 'slow' }] });

    expect(description.network).toBe('noc');
    expect(description.graph.edgeCount).toBe(0);
    expect(description.flows).toEqual([]);
    expect(description.niuEntryOnly).toBeUndefined();
  });

  it('should report schema violations as ConfigError with their path', () => {
    const bad = record();
    bad.nodes[1] = { kind: 'NIU', id: 1, name: 'CPU_NIU', width: 64, clock_domain: '' };

    expect(() => parseTopologyDescription(bad)).toThrow(ConfigError);
    expect(() => parseTopologyDescription(bad)).toThrow(/nodes\.1\.clock_domain/);
  });

  it('should reject non-positive bandwidth and frequency', () => {
    const badTarget = record();
    badTarget.nodes[2] = { type: 'Target', id: 2, name: 'MEM', max_bandwidth: -1, latency: 20 };
    expect(() => parseTopologyDescription(badTarget)).toThrow(ConfigError);
    expect(() => parseTopologyDescription(badTarget)).toThrow(/^Invalid topology description: nodes\.2\.max_bandwidth/);

    const badDomain = record();
    badDomain.constraints.clock_domains[0] = { name: 'fast', frequency: 0 };
    expect(() => parseTopologyDescription(badDomain)).toThrow(/constraints\.clock_domains\.0\.frequency/);

    const badFlow = record();
    badFlow.constraints.bandwidth_allocation[0] = { src: 0, dst: 2, bandwidth: 0, max_latency: 50 };
    expect(() => parseTopologyDescription(badFlow)).toThrow(/constraints\.bandwidth_allocation\.0\.bandwidth/);
  });

  it('should reject unknown node kinds', () => {
    const bad = { nodes: [{ type: 'Bridge', id: 0, name: 'B' }] };
    expect(() => parseTopologyDescription(bad)).toThrow(/^Invalid topology description: nodes\.0\.type/);
  });

  it('should reject a num_nodes mismatch', () => {
    expect(() => parseTopologyDescription({ ...record(), num_nodes: 5 })).toThrow(
      new StructuralError('num_nodes is 5 but 3 nodes are listed')
    );
  });

  it('should reject dangling edge references', () => {
    const bad = record();
    bad.graph.edges.push({ src: 2, dst: 7, width: 64, latency: 1 });

    expect(() => parseTopologyDescription(bad)).toThrow(StructuralError);
  });
});

describe('toTopologyDescription', () => {
  it('should write snake_case records and omit unset optionals', () => {
    const graph = TopologyGraph.create([niu(0, 'A', 128), router(1, 'R', 2, { width: 128 })], [edge(0, 1, 128, 2)]);
    const described = toTopologyDescription(graph);

    expect(described).toEqual({
      network: 'noc',
      num_nodes: 2,
      nodes: [
        { type: 'NIU', id: 0, name: 'A', width: 128, clock_domain: 'fast' },
        { type: 'Router', id: 1, name: 'R', width: 128, clock_domain: 'fast', num_ports: 2 },
      ],
      graph: { edges: [{ src: 0, dst: 1, width: 128, latency: 2 }] },
      constraints: { clock_domains: [], bandwidth_allocation: [] },
    });
  });

  it('should be read back into an equal graph', () => {
    const original = parseTopologyDescription(record());
    const again = parseTopologyDescription(
      toTopologyDescription(original.graph, {
        network: original.network,
        clockDomains: original.clockDomains,
        flows: original.flows,
        niuEntryOnly: original.niuEntryOnly,
      })
    );

    expect(again.graph.nodes).toEqual(original.graph.nodes);
    expect(again.graph.edges).toEqual(original.graph.edges);
    expect(again.flows).toEqual(original.flows);
    expect(again.niuEntryOnly).toBe(false);
  });
});

describe('parseRequirements', () => {
  it('should map a requirements record to generator input', () => {
    const requirements = parseRequirements({
      initiators: [{ name: 'CPU', type: 'CPU', avg_throughput: 4, max_throughput: 8, latency_req: 80, priority: 1 }],
      targets: [{ name: 'DDR', max_bandwidth: 25.6, latency: 40, size: 8 }],
      traffic_flows: [{ src: 'CPU', dst: 'DDR', bandwidth: 4, max_latency: 80 }],
      constraints: { clock_domains: [{ name: 'fast', frequency: 2000 }] },
    });

    expect(requirements).toEqual({
      initiators: [
        {
          name: 'CPU',
          type: 'CPU',
          avgThroughput: 4,
          maxThroughput: 8,
          latencyRequirement: 80,
          priority: 1,
          trafficPattern: undefined,
        },
      ],
      targets: [{ name: 'DDR', type: undefined, maxBandwidth: 25.6, latency: 40, size: 8 }],
      trafficFlows: [{ src: 'CPU', dst: 'DDR', bandwidth: 4, maxLatency: 80, priority: 0 }],
      clockDomains: [{ name: 'fast', frequency: 2000 }],
      optimizeFor: 'bandwidth',
    });
  });

  it('should prefer latency_requirement over its alias', () => {
    const requirements = parseRequirements({
      initiators: [
        { name: 'CPU', avg_throughput: 1, max_throughput: 2, latency_requirement: 30, latency_req: 99 },
      ],
      targets: [{ name: 'DDR', max_bandwidth: 8, latency: 10 }],
      optimize_for: 'latency',
    });

    expect(requirements.initiators[0].latencyRequirement).toBe(30);
    expect(requirements.optimizeFor).toBe('latency');
    expect(requirements.trafficFlows).toEqual([]);
  });

  it('should reject zero throughput and negative target bandwidth', () => {
    expect(() =>
      parseRequirements({
        initiators: [{ name: 'CPU', avg_throughput: 1, max_throughput: 0, latency_requirement: 30 }],
        targets: [{ name: 'DDR', max_bandwidth: 8, latency: 10 }],
      })
    ).toThrow(/^Invalid requirements: initiators\.0\.max_throughput/);
    expect(() =>
      parseRequirements({
        initiators: [{ name: 'CPU', avg_throughput: 1, max_throughput: 2, latency_requirement: 30 }],
        targets: [{ name: 'DDR', max_bandwidth: -8, latency: 10 }],
      })
    ).toThrow(/^Invalid requirements: targets\.0\.max_bandwidth/);
  });

  it('should reject records missing required fields', () => {
    expect(() => parseRequirements({ initiators: [{ name: 'CPU' }], targets: [] })).toThrow(
      /^Invalid requirements: initiators\.0\.avg_throughput/
    );
  });
});
