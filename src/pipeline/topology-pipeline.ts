/**
 * Topology Pipeline
 *
 * Generator -> Converter Inserter -> Validator -> Bandwidth Optimizer
 * -> Validator -> Routing Table Builder -> Sweep Controller
 *
 * Every stage gets a fresh immutable graph. The sweep only runs when a
 * simulator is supplied and the final validation reports no errors.
 */

import { createEngineConfig, type EngineConfig } from '../shared/config.js';
import { EngineLogger } from '../shared/logger.js';
import type { Requirements } from '../shared/types/requirements.js';
import type { TrafficPattern } from '../shared/types/topology.js';
import { insertConverters, type InsertionResult } from '../graph-engine/converter-inserter.js';
import { buildRoutingTable, type RoutingTable } from '../graph-engine/routing-table.js';
import type { TopologyGraph } from '../graph-engine/topology-graph.js';
import { generateTopology } from '../generator/topology-generator.js';
import type { GeneratedTopology } from '../generator/types.js';
import { optimizeBandwidth } from '../optimizer/bandwidth-optimizer.js';
import { planFlowImplementations } from '../optimizer/implementation-planner.js';
import type { ImplementationPlan, OptimizationResult } from '../optimizer/types.js';
import { createSimulationOracle } from '../sweep/simulation-oracle.js';
import { SweepController } from '../sweep/sweep-controller.js';
import type { NetworkSimulator, SweepOptions, SweepResult } from '../sweep/types.js';
import { validateTopology } from '../validation/topology-validator.js';
import type { TopologyValidationResult } from '../validation/types.js';

export interface PipelineOptions {
  /** Overrides on top of the environment defaults */
  config?: Partial<EngineConfig>;
  simulator?: NetworkSimulator;
  trafficPattern?: TrafficPattern;
  sweep?: Partial<Pick<SweepOptions, 'zeroLoadFactor' | 'slopeLimit' | 'minStep' | 'maxRate'>>;
}

export interface PipelineResult {
  config: EngineConfig;
  generated: GeneratedTopology;
  insertion: InsertionResult;
  initialValidation: TopologyValidationResult;
  /** Absent when optimizeFor is 'none' */
  optimization?: OptimizationResult;
  plan: ImplementationPlan;
  finalValidation: TopologyValidationResult;
  graph: TopologyGraph;
  routing: RoutingTable;
  sweep?: SweepResult;
}

/**
 * Run the full pipeline for one requirements description
 */
export async function runTopologyPipeline(
  requirements: Requirements,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const config = createEngineConfig(options.config);

  try {
    const generated = generateTopology(requirements, config);
    const { flows } = generated;
    const validateOptions = { flows, niuEntryOnly: config.niuEntryOnly };

    const insertion = insertConverters(generated.graph, {
      enabled: config.autoInsertConverters,
      fallbackDomain: config.fastDomainName,
    });

    const initialValidation = validateTopology(insertion.graph, validateOptions);
    EngineLogger.validationResult('pre-optimization', initialValidation.errors.length, initialValidation.warnings.length);

    const optimization =
      requirements.optimizeFor === 'none'
        ? undefined
        : optimizeBandwidth(insertion.graph, flows, {
            config,
            optimizeFor: requirements.optimizeFor,
            clockDomains: requirements.clockDomains,
          });
    const plan = planFlowImplementations(flows, { config, optimizeFor: requirements.optimizeFor });

    const graph = optimization?.graph ?? insertion.graph;
    const finalValidation = validateTopology(graph, validateOptions);
    EngineLogger.validationResult('post-optimization', finalValidation.errors.length, finalValidation.warnings.length);

    const routing = buildRoutingTable(graph);
    EngineLogger.debug(`routing table: ${routing.size} entries`);

    let sweep: SweepResult | undefined;
    if (options.simulator) {
      if (finalValidation.valid) {
        const controller = new SweepController({
          ...options.sweep,
          step: config.sweepStep,
          threshold: config.sweepThreshold,
        });
        sweep = await controller.run(
          createSimulationOracle(options.simulator, graph, options.trafficPattern ?? 'uniform')
        );
      } else {
        EngineLogger.info(`sweep skipped: ${finalValidation.errors.length} validation error(s)`);
      }
    }

    return {
      config,
      generated,
      insertion,
      initialValidation,
      optimization,
      plan,
      finalValidation,
      graph,
      routing,
      sweep,
    };
  } catch (error) {
    EngineLogger.error('Topology pipeline failed', error instanceof Error ? error : undefined);
    throw error;
  }
}
