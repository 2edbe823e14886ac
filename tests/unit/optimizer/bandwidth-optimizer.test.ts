/**
 * Unit Tests - Bandwidth Optimizer
 */

import { describe, it, expect } from 'vitest';
import { generateTopology } from '../../../src/generator/topology-generator.js';
import { insertConverters } from '../../../src/graph-engine/converter-inserter.js';
import { TopologyGraph } from '../../../src/graph-engine/topology-graph.js';
import {
  aggregateFlows,
  attachPoint,
  classifyBandwidth,
  classifyFlows,
  findCrossbar,
  optimizeBandwidth,
} from '../../../src/optimizer/bandwidth-optimizer.js';
import { ConfigError, StructuralError } from '../../../src/shared/errors.js';
import type { Requirements } from '../../../src/shared/types/requirements.js';
import { validateTopology } from '../../../src/validation/topology-validator.js';
import {
  edge,
  fourLowFlowRequirements,
  initiator,
  niu,
  router,
  target,
  testConfig,
  twoInitiatorRequirements,
} from '../../setup.js';

function generated(requirements: Requirements) {
  return generateTopology(requirements, testConfig());
}

/**
 * A (64 GB/s) and B (8 GB/s) into HBM; A->HBM is a high-bandwidth flow
 */
function highFlowRequirements(): Requirements {
  return {
    initiators: [
      { name: 'A', avgThroughput: 32, maxThroughput: 64, latencyRequirement: 200, priority: 0 },
      { name: 'B', avgThroughput: 4, maxThroughput: 8, latencyRequirement: 200, priority: 1 },
    ],
    targets: [{ name: 'HBM', maxBandwidth: 128, latency: 60, size: 16 }],
    trafficFlows: [
      { src: 'A', dst: 'HBM', bandwidth: 60, maxLatency: 200, priority: 0 },
      { src: 'B', dst: 'HBM', bandwidth: 10, maxLatency: 200, priority: 1 },
    ],
    clockDomains: [{ name: 'fast', frequency: 2000 }],
    optimizeFor: 'bandwidth',
  };
}

/**
 * Slow-domain peripherals into a fast SRAM; every path crosses a CDC and a width converter
 */
function peripheralRequirements(latencyRequirements: number[]): Requirements {
  const names = ['UART', 'I2C', 'SPI'].slice(0, latencyRequirements.length);
  return {
    initiators: names.map((name, priority) => ({
      name,
      avgThroughput: 0.5,
      maxThroughput: 1,
      latencyRequirement: latencyRequirements[priority],
      priority,
    })),
    targets: [{ name: 'SRAM', maxBandwidth: 16, latency: 20, size: 1 }],
    trafficFlows: names.map((name, priority) => ({
      src: name,
      dst: 'SRAM',
      bandwidth: 1,
      maxLatency: latencyRequirements[priority],
      priority,
    })),
    clockDomains: [
      { name: 'fast', frequency: 2000 },
      { name: 'slow', frequency: 1000 },
    ],
    optimizeFor: 'bandwidth',
  };
}

function inserted(requirements: Requirements) {
  const { graph, flows } = generated(requirements);
  return { graph: insertConverters(graph, { enabled: true }).graph, flows };
}

describe('flow classification', () => {
  it('should merge flows per pair keeping the tightest limits', () => {
    const merged = aggregateFlows([
      { src: 0, dst: 4, bandwidth: 2, maxLatency: 50, priority: 1 },
      { src: 2, dst: 4, bandwidth: 3, maxLatency: 80, priority: 2 },
      { src: 0, dst: 4, bandwidth: 5, maxLatency: 30, priority: 0 },
    ]);

    expect(merged).toEqual([
      { src: 0, dst: 4, bandwidth: 7, maxLatency: 30, priority: 0, firstIndex: 0 },
      { src: 2, dst: 4, bandwidth: 3, maxLatency: 80, priority: 2, firstIndex: 1 },
    ]);
  });

  it('should classify with inclusive high and exclusive low bounds', () => {
    const config = testConfig();
    expect(classifyBandwidth(50, config)).toBe('high');
    expect(classifyBandwidth(49.9, config)).toBe('medium');
    expect(classifyBandwidth(5, config)).toBe('medium');
    expect(classifyBandwidth(4.99, config)).toBe('low');
  });

  it('should follow configured thresholds', () => {
    const flows = aggregateFlows([{ src: 0, dst: 1, bandwidth: 20, maxLatency: 10, priority: 0 }]);
    expect(classifyFlows(flows, testConfig({ highBwThreshold: 20, lowBwThreshold: 1 })).high).toHaveLength(1);
    expect(classifyFlows(flows, testConfig()).medium).toHaveLength(1);
  });
});

describe('graph helpers', () => {
  it('should fall back to the best-connected router without a crossbar tag', () => {
    const graph = TopologyGraph.create(
      [niu(0, 'A'), niu(1, 'B'), router(2, 'R_SMALL', 2), router(3, 'R_BIG', 4), niu(4, 'C')],
      [edge(0, 3), edge(1, 3), edge(3, 4), edge(0, 2)]
    );
    expect(findCrossbar(graph)?.name).toBe('R_BIG');
  });

  it('should attach through the NIU or the endpoint itself', () => {
    const graph = TopologyGraph.create(
      [initiator(0, 'CPU'), niu(1, 'CPU_NIU'), router(2, 'R', 2), target(3, 'MEM')],
      [edge(0, 1), edge(1, 2), edge(2, 3)]
    );
    expect(attachPoint(graph, 0, 'initiator')).toBe(1);
    expect(attachPoint(graph, 3, 'target')).toBe(3);
  });
});

describe('optimizeBandwidth', () => {
  describe('low-bandwidth grouping', () => {
    it('should put four 2 GB/s flows behind one 4:1 arbiter', () => {
      const { graph, flows } = generated(fourLowFlowRequirements());
      const result = optimizeBandwidth(graph, flows, { config: testConfig() });

      expect(result.changed).toBe(true);
      expect(result.arbiters).toEqual([{ arbiterId: 11, name: 'SRAM_ARB0', target: 8, initiators: [0, 2, 4, 6] }]);
      expect(result.removedEdges).toEqual([
        { src: 1, dst: 10 },
        { src: 3, dst: 10 },
        { src: 5, dst: 10 },
        { src: 7, dst: 10 },
      ]);
      expect(result.graph.nodeCount).toBe(graph.nodeCount + 1);
      expect(result.graph.edgeCount).toBe(11);
      expect(result.graph.neighbors(11, 'out')).toEqual([10]);
      expect(result.graph.neighbors(10, 'in')).toEqual([11]);
    });

    it('should configure the arbiter from the crossbar', () => {
      const { graph, flows } = generated(fourLowFlowRequirements());
      const result = optimizeBandwidth(graph, flows, { config: testConfig() });

      expect(result.graph.requireNode(11)).toEqual({
        kind: 'Arbiter',
        id: 11,
        name: 'SRAM_ARB0',
        numInputs: 4,
        width: 32,
        policy: 'priority',
        clockDomain: 'fast',
        grantOrder: [0, 2, 4, 6],
      });
      expect(result.crossbarPorts).toBe(2);
      expect(result.graph.nodeOfKind(10, 'Router')?.numPorts).toBe(2);
      expect(result.inserted).toEqual([]);
    });

    it('should grant in initiator priority order', () => {
      const requirements = fourLowFlowRequirements();
      const priorities = [2, 0, 3, 1];
      requirements.initiators = requirements.initiators.map((init, index) => ({ ...init, priority: priorities[index] }));
      const { graph, flows } = generated(requirements);

      expect(optimizeBandwidth(graph, flows, { config: testConfig() }).arbiters[0].initiators).toEqual([2, 6, 0, 4]);
    });

    it('should leave a fifth flow on the crossbar', () => {
      const requirements = fourLowFlowRequirements();
      requirements.initiators.push({ name: 'DMA4', avgThroughput: 1, maxThroughput: 2, latencyRequirement: 100, priority: 4 });
      requirements.trafficFlows.push({ src: 'DMA4', dst: 'SRAM', bandwidth: 2, maxLatency: 100, priority: 4 });
      const { graph, flows } = generated(requirements);
      const result = optimizeBandwidth(graph, flows, { config: testConfig() });

      expect(result.arbiters).toHaveLength(1);
      expect(result.arbiters[0].initiators).toEqual([0, 2, 4, 6]);
      expect(result.graph.hasEdge(9, 12)).toBe(true);
      expect(result.crossbarPorts).toBe(3);
    });

    it('should not group under the latency profile', () => {
      const { graph, flows } = generated(fourLowFlowRequirements());
      const result = optimizeBandwidth(graph, flows, { config: testConfig(), optimizeFor: 'latency' });

      expect(result.changed).toBe(false);
      expect(result.graph).toBe(graph);
    });
  });

  describe('latency budget', () => {
    // NIU -> CDC -> WC -> crossbar costs 28 cycles end to end; behind an arbiter it costs 29

    it('should not group initiators when the arbiter hop breaks their latency requirement', () => {
      const { graph, flows } = inserted(peripheralRequirements([28, 28]));
      expect(validateTopology(graph, { flows }).errors).toEqual([]);

      const result = optimizeBandwidth(graph, flows, { config: testConfig() });

      expect(result.changed).toBe(false);
      expect(result.graph).toBe(graph);
      expect(result.arbiters).toEqual([]);
      expect(validateTopology(result.graph, { flows }).errors).toEqual([]);
    });

    it('should group initiators whose requirement absorbs the extra hop', () => {
      const { graph, flows } = inserted(peripheralRequirements([29, 29]));
      const result = optimizeBandwidth(graph, flows, { config: testConfig() });

      expect(result.arbiters).toEqual([{ arbiterId: 11, name: 'SRAM_ARB0', target: 4, initiators: [0, 2] }]);
      expect(validateTopology(result.graph, { flows }).errors).toEqual([]);
    });

    it('should leave only the tight initiator on the crossbar', () => {
      const { graph, flows } = inserted(peripheralRequirements([28, 100, 100]));
      const result = optimizeBandwidth(graph, flows, { config: testConfig() });

      expect(result.arbiters).toEqual([{ arbiterId: 15, name: 'SRAM_ARB0', target: 6, initiators: [2, 4] }]);
      expect(result.removedEdges).toEqual([
        { src: 3, dst: 10 },
        { src: 5, dst: 11 },
      ]);
      expect(result.graph.hasEdge(1, 9)).toBe(true);
      expect(validateTopology(result.graph, { flows }).errors).toEqual([]);
    });
  });

  describe('dedicated routers', () => {
    const config = testConfig({ autoInsertConverters: false });

    it('should give a high-bandwidth flow its own router', () => {
      const { graph, flows } = generated(highFlowRequirements());
      const result = optimizeBandwidth(graph, flows, { config });

      expect(result.dedicated).toEqual([
        { routerId: 7, name: 'A_HBM_DR', initiator: 0, target: 4, bandwidth: 60, width: 256 },
      ]);
      expect(result.graph.nodeOfKind(7, 'Router')).toEqual({
        kind: 'Router',
        id: 7,
        name: 'A_HBM_DR',
        width: 256,
        clockDomain: 'fast',
        numPorts: 2,
        role: 'dedicated',
      });
      expect(result.graph.edge(1, 7)).toEqual({ src: 1, dst: 7, width: 256, latency: 1 });
      expect(result.graph.edge(7, 5)).toEqual({ src: 7, dst: 5, width: 256, latency: 1 });
    });

    it('should detach an initiator whose flows all bypass the crossbar', () => {
      const { graph, flows } = generated(highFlowRequirements());
      const result = optimizeBandwidth(graph, flows, { config });

      expect(result.removedEdges).toEqual([{ src: 1, dst: 6 }]);
      expect(result.graph.hasEdge(6, 5)).toBe(true);
      expect(result.crossbarPorts).toBe(2);
      expect(result.crossbarBandwidth).toEqual({ before: 70, after: 10 });
    });

    it('should size the router from the declared fast frequency', () => {
      const { graph, flows } = generated(highFlowRequirements());
      const result = optimizeBandwidth(graph, flows, {
        config,
        clockDomains: [{ name: 'fast', frequency: 1000 }],
      });

      // 60 GB/s at 1000 MHz needs 480 bits
      expect(result.dedicated[0].width).toBe(512);
    });
  });

  describe('no-op cases', () => {
    it('should return the same graph when nothing can change', () => {
      const { graph, flows } = generated(twoInitiatorRequirements());
      const result = optimizeBandwidth(graph, flows, { config: testConfig() });

      expect(result.graph).toBe(graph);
      expect(result.changed).toBe(false);
      expect(result.classification.low.map((f) => f.src)).toEqual([0]);
      expect(result.classification.medium.map((f) => f.src)).toEqual([2]);
      expect(result.crossbarBandwidth).toEqual({ before: 10, after: 10 });
    });

    it('should be idempotent on its own output', () => {
      const { graph, flows } = generated(fourLowFlowRequirements());
      const once = optimizeBandwidth(graph, flows, { config: testConfig() });
      const twice = optimizeBandwidth(once.graph, flows, { config: testConfig() });

      expect(twice.changed).toBe(false);
      expect(twice.graph).toBe(once.graph);
    });
  });

  describe('preconditions', () => {
    it('should reject flows that do not run from an Initiator to a Target', () => {
      const { graph } = generated(twoInitiatorRequirements());

      expect(() =>
        optimizeBandwidth(graph, [{ src: 1, dst: 4, bandwidth: 1, maxLatency: 10, priority: 0 }], {
          config: testConfig(),
        })
      ).toThrow(StructuralError);
    });

    it('should reject an inconsistent configuration', () => {
      const { graph, flows } = generated(twoInitiatorRequirements());

      expect(() => optimizeBandwidth(graph, flows, { config: { ...testConfig(), lowBwThreshold: 60 } })).toThrow(
        ConfigError
      );
    });

    it('should require a crossbar router when restructuring is needed', () => {
      const graph = TopologyGraph.create(
        [initiator(0, 'CPU'), niu(1, 'CPU_NIU'), niu(2, 'MEM_NIU'), target(3, 'MEM')],
        [edge(0, 1), edge(1, 2), edge(2, 3)]
      );

      expect(() =>
        optimizeBandwidth(graph, [{ src: 0, dst: 3, bandwidth: 1, maxLatency: 10, priority: 0 }], {
          config: testConfig(),
        })
      ).toThrow('Topology has no router to act as crossbar');
    });
  });
});
