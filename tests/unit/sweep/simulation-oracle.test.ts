/**
 * Unit Tests - Simulation Oracle
 */

import { describe, it, expect, vi } from 'vitest';
import { TopologyGraph } from '../../../src/graph-engine/topology-graph.js';
import { createSimulationOracle, toLatencyProbe } from '../../../src/sweep/simulation-oracle.js';
import type { NetworkSimulator, SimResult } from '../../../src/sweep/types.js';
import { niu } from '../../setup.js';

describe('simulation oracle', () => {
  it('should map a completed run to its average latency', () => {
    expect(toLatencyProbe({ avgLatency: 12.5, pktGenerated: 100, totalReceived: 100, timeout: false })).toEqual({
      latency: 12.5,
      saturated: false,
    });
  });

  it('should map a timeout to a saturated probe', () => {
    expect(toLatencyProbe({ avgLatency: 0, pktGenerated: 100, totalReceived: 3, timeout: true }).saturated).toBe(true);
  });

  it('should pass graph, rate and pattern to the simulator', async () => {
    const graph = TopologyGraph.create([niu(0, 'A')], []);
    const result: SimResult = { avgLatency: 8, pktGenerated: 10, totalReceived: 10, timeout: false };
    const simulate = vi.fn<NetworkSimulator['simulate']>().mockResolvedValue(result);
    const oracle = createSimulationOracle({ simulate }, graph, 'streaming');

    await expect(oracle(35)).resolves.toEqual({ latency: 8, saturated: false });
    expect(simulate).toHaveBeenCalledWith(graph, 35, 'streaming');
  });
});
