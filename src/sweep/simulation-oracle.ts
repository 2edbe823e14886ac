/**
 * Simulation Oracle
 *
 * Adapts an external NetworkSimulator to the LatencyOracle the sweep consumes.
 * A timed-out run is reported as saturated.
 */

import type { TopologyGraph } from '../graph-engine/topology-graph.js';
import type { TrafficPattern } from '../shared/types/topology.js';
import type { LatencyOracle, LatencyProbe, NetworkSimulator, SimResult } from './types.js';

export function toLatencyProbe(result: SimResult): LatencyProbe {
  return { latency: result.avgLatency, saturated: result.timeout };
}

export function createSimulationOracle(
  simulator: NetworkSimulator,
  graph: TopologyGraph,
  pattern: TrafficPattern = 'uniform'
): LatencyOracle {
  return async (injectionRate: number) => toLatencyProbe(await simulator.simulate(graph, injectionRate, pattern));
}
