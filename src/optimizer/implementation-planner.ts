/**
 * Flow Implementation Planner
 *
 * Picks an implementation per flow (direct / crossbar / arbiter) by weighted
 * cost over throughput, latency and area. Flows are visited in descending
 * bandwidth order; a flow that no longer fits on the crossbar is forced onto
 * a dedicated path.
 *
 * The plan is a report. optimizeBandwidth() does the actual restructuring.
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import type { OptimizeFor } from '../shared/types/requirements.js';
import type { TrafficFlow } from '../shared/types/topology.js';
import { aggregateFlows } from './bandwidth-optimizer.js';
import {
  IMPLEMENTATION_OPTIONS,
  MAX_AREA_COST,
  WEIGHT_PROFILES,
  type AggregatedFlow,
  type FlowSelection,
  type ImplementationKind,
  type ImplementationOption,
  type ImplementationPlan,
  type ObjectiveWeights,
  type PlanSummary,
} from './types.js';

export interface PlanOptions {
  config?: EngineConfig;
  optimizeFor?: OptimizeFor;
  /** Overrides the optimizeFor profile; normalised to sum 1 */
  weights?: Partial<ObjectiveWeights>;
}

export function normalizeWeights(weights: ObjectiveWeights): ObjectiveWeights {
  const total = weights.throughput + weights.latency + weights.area;
  if (!(total > 0) || weights.throughput < 0 || weights.latency < 0 || weights.area < 0) {
    throw new ConfigError(
      `Objective weights must be non-negative with a positive sum, got ${JSON.stringify(weights)}`
    );
  }
  return {
    throughput: weights.throughput / total,
    latency: weights.latency / total,
    area: weights.area / total,
  };
}

/**
 * Options a flow may use, in catalogue order
 */
export function implementationOptions(
  flow: AggregatedFlow,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): ImplementationOption[] {
  const options: ImplementationOption[] = [];
  if (flow.bandwidth >= config.highBwThreshold) {
    options.push(IMPLEMENTATION_OPTIONS.direct);
  }
  options.push(IMPLEMENTATION_OPTIONS.crossbar);
  if (flow.bandwidth < config.lowBwThreshold) {
    options.push(IMPLEMENTATION_OPTIONS.arbiter);
  }
  return options;
}

/**
 * Weighted penalty, lower is better
 */
export function implementationCost(
  option: ImplementationOption,
  flow: AggregatedFlow,
  weights: ObjectiveWeights
): number {
  const throughputPenalty = 1 - option.throughputScore;
  const latencyPenalty = flow.maxLatency > 0 ? Math.min(option.latencyCycles / flow.maxLatency, 1) : 1;
  const areaPenalty = option.areaCost / MAX_AREA_COST;

  return (
    weights.throughput * throughputPenalty +
    weights.latency * latencyPenalty +
    weights.area * areaPenalty
  );
}

function summarize(selections: readonly FlowSelection[], crossbarLoad: number): PlanSummary {
  const distribution: Record<ImplementationKind, number> = { direct: 0, crossbar: 0, arbiter: 0 };
  let totalArea = 0;
  let totalLatency = 0;
  let crossbarFlows = 0;

  for (const { option } of selections) {
    distribution[option.kind] += 1;
    totalArea += option.areaCost;
    totalLatency += option.latencyCycles;
    if (option.usesCrossbar) crossbarFlows += 1;
  }

  return {
    distribution,
    totalArea,
    averageLatency: selections.length > 0 ? totalLatency / selections.length : 0,
    crossbarFlows,
    dedicatedPaths: distribution.direct,
    arbiterFlows: distribution.arbiter,
    crossbarLoad,
  };
}

/**
 * Greedy lowest-cost selection under the crossbar capacity
 */
export function planFlowImplementations(
  flows: readonly TrafficFlow[],
  options: PlanOptions = {}
): ImplementationPlan {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const profile = WEIGHT_PROFILES[options.optimizeFor ?? 'bandwidth'];
  const weights = normalizeWeights({ ...profile, ...options.weights });

  const ordered = [...aggregateFlows(flows)].sort((a, b) => b.bandwidth - a.bandwidth);
  const selections: FlowSelection[] = [];
  let crossbarLoad = 0;

  for (const flow of ordered) {
    const fits = crossbarLoad + flow.bandwidth <= config.crossbarCapacity;
    let best: FlowSelection | undefined;

    for (const option of implementationOptions(flow, config)) {
      if (option.usesCrossbar && !fits) continue;
      const cost = implementationCost(option, flow, weights);
      if (!best || cost < best.cost) {
        best = { flow, option, cost, forced: false };
      }
    }

    if (!best) {
      const direct = IMPLEMENTATION_OPTIONS.direct;
      best = { flow, option: direct, cost: implementationCost(direct, flow, weights), forced: true };
    }
    if (best.option.usesCrossbar) {
      crossbarLoad += flow.bandwidth;
    }
    selections.push(best);
  }

  return { weights, selections, summary: summarize(selections, crossbarLoad) };
}
