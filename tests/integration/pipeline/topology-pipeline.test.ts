/**
 * Integration Tests - Topology Pipeline
 *
 * Generator -> Inserter -> Validator -> Optimizer -> Validator -> Routing -> Sweep
 * on a mixed system with high, medium and low flows across two clock domains.
 */

import { describe, it, expect, vi } from 'vitest';
import { runTopologyPipeline } from '../../../src/pipeline/topology-pipeline.js';
import { ConfigError } from '../../../src/shared/errors.js';
import type { NetworkSimulator, SimResult } from '../../../src/sweep/types.js';
import { mixedRequirements, testConfig, twoInitiatorRequirements } from '../../setup.js';

function flatSimulator(saturatesAt: number) {
  const simulate = vi.fn<NetworkSimulator['simulate']>(
    (_graph, rate): SimResult => ({
      avgLatency: 20,
      pktGenerated: 1000,
      totalReceived: rate >= saturatesAt ? 400 : 1000,
      timeout: rate >= saturatesAt,
    })
  );
  return { simulate };
}

describe('runTopologyPipeline', () => {
  const config = testConfig();

  it('should auto-insert converters on the generated crossbar', async () => {
    const result = await runTopologyPipeline(mixedRequirements(), { config });

    expect(result.insertion.inserted.map((c) => c.name)).toEqual([
      'UART_NIU_Crossbar_CDC',
      'I2C_NIU_Crossbar_CDC',
      'GPU_NIU_Crossbar_WC',
      'CPU_NIU_Crossbar_WC',
      'UART_NIU_Crossbar_CDC_Crossbar_WC',
      'I2C_NIU_Crossbar_CDC_Crossbar_WC',
      'Crossbar_ROM_NIU_WC',
    ]);
    expect(result.initialValidation).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('should give the high flow a dedicated router and group the low flows', async () => {
    const result = await runTopologyPipeline(mixedRequirements(), { config });
    const optimization = result.optimization;

    expect(optimization?.dedicated.map((d) => [d.name, d.routerId, d.width])).toEqual([['GPU_HBM_DR', 20, 256]]);
    expect(optimization?.arbiters).toEqual([{ arbiterId: 21, name: 'ROM_ARB0', target: 10, initiators: [6, 4] }]);
    expect(optimization?.removedEdges).toEqual([
      { src: 1, dst: 15 },
      { src: 7, dst: 14 },
      { src: 5, dst: 13 },
    ]);
    expect(optimization?.inserted.map((c) => c.name)).toEqual([
      'I2C_NIU_ROM_ARB0_CDC',
      'UART_NIU_ROM_ARB0_CDC',
      'GPU_HBM_DR_HBM_NIU_WC',
      'I2C_NIU_ROM_ARB0_CDC_ROM_ARB0_WC',
      'UART_NIU_ROM_ARB0_CDC_ROM_ARB0_WC',
    ]);
    expect(optimization?.crossbarPorts).toBe(4);
    expect(optimization?.crossbarBandwidth).toEqual({ before: 72, after: 12 });
  });

  it('should produce a valid final topology', async () => {
    const result = await runTopologyPipeline(mixedRequirements(), { config });

    expect(result.finalValidation).toEqual({ valid: true, errors: [], warnings: [] });
    expect(result.graph.nodeCount).toBe(22);
    expect(result.graph.edgeCount).toBe(21);
    expect(result.graph.find('Arbiter')).toHaveLength(1);
    expect(result.graph.find('WidthConverter').map((n) => n.id)).toEqual([16, 19, 24, 25, 26]);
  });

  it('should route the high flow around the crossbar', async () => {
    const result = await runTopologyPipeline(mixedRequirements(), { config });

    expect(result.routing.trace(0, 8)).toEqual([0, 1, 20, 24, 9, 8]);
    expect(result.routing.trace(4, 10)).toEqual([4, 5, 23, 26, 21, 12, 19, 11, 10]);
    expect(result.routing.lookup(8, 0)).toBeUndefined();
  });

  it('should report a per-flow implementation plan', async () => {
    const result = await runTopologyPipeline(mixedRequirements(), { config });

    expect(result.plan.selections.map((s) => [s.flow.src, s.option.kind])).toEqual([
      [0, 'direct'],
      [2, 'crossbar'],
      [4, 'crossbar'],
      [6, 'crossbar'],
    ]);
  });

  it('should sweep the final graph when a simulator is supplied', async () => {
    const simulator = flatSimulator(60);
    const result = await runTopologyPipeline(mixedRequirements(), { config, simulator });

    expect(result.sweep?.state).toBe('Saturated');
    expect(result.sweep?.saturationRate).toBe(60);
    expect(result.sweep?.oracleCalls).toBe(7);
    expect(simulator.simulate).toHaveBeenCalledWith(result.graph, 0, 'uniform');
  });

  it('should skip the sweep when validation fails', async () => {
    const requirements = twoInitiatorRequirements();
    requirements.initiators[0] = { ...requirements.initiators[0], latencyRequirement: 10 };
    const simulator = flatSimulator(60);
    const result = await runTopologyPipeline(requirements, { config, simulator });

    expect(result.finalValidation.errors.map((e) => e.errorType)).toEqual(['LatencyError']);
    expect(result.sweep).toBeUndefined();
    expect(simulator.simulate).not.toHaveBeenCalled();
  });

  it('should not let the optimizer introduce a latency violation', async () => {
    const result = await runTopologyPipeline(
      {
        initiators: [
          { name: 'UART', avgThroughput: 0.5, maxThroughput: 1, latencyRequirement: 28, priority: 0 },
          { name: 'I2C', avgThroughput: 0.5, maxThroughput: 1, latencyRequirement: 28, priority: 1 },
        ],
        targets: [{ name: 'SRAM', maxBandwidth: 16, latency: 20, size: 1 }],
        trafficFlows: [
          { src: 'UART', dst: 'SRAM', bandwidth: 1, maxLatency: 28, priority: 0 },
          { src: 'I2C', dst: 'SRAM', bandwidth: 1, maxLatency: 28, priority: 1 },
        ],
        clockDomains: [
          { name: 'fast', frequency: 2000 },
          { name: 'slow', frequency: 1000 },
        ],
        optimizeFor: 'bandwidth',
      },
      { config }
    );

    expect(result.initialValidation.errors).toEqual([]);
    expect(result.optimization?.arbiters).toEqual([]);
    expect(result.finalValidation.errors).toEqual([]);
  });

  it('should skip the optimizer for optimizeFor none', async () => {
    const result = await runTopologyPipeline(mixedRequirements({ optimizeFor: 'none' }), { config });

    expect(result.optimization).toBeUndefined();
    expect(result.graph).toBe(result.insertion.graph);
  });

  it('should keep the inserter output when the optimizer changes nothing', async () => {
    const result = await runTopologyPipeline(twoInitiatorRequirements(), { config });

    expect(result.optimization?.changed).toBe(false);
    expect(result.graph).toBe(result.insertion.graph);
    expect(result.insertion.inserted.map((c) => c.name)).toEqual(['CPU_NIU_Crossbar_WC', 'GPU_NIU_Crossbar_WC']);
  });

  it('should fail fast on invalid requirements', async () => {
    await expect(runTopologyPipeline(twoInitiatorRequirements({ initiators: [] }), { config })).rejects.toThrow(
      ConfigError
    );
  });

  it('should reject an invalid configuration', async () => {
    await expect(
      runTopologyPipeline(twoInitiatorRequirements(), { config: { ...config, crossbarCapacity: -5 } })
    ).rejects.toThrow('Invalid engine configuration: crossbarCapacity must be > 0, got -5');
  });
});
