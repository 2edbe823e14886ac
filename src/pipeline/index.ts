/**
 * Pipeline Orchestration
 */

export {
  runTopologyPipeline,
  type PipelineOptions,
  type PipelineResult
} from './topology-pipeline.js';
export {
  DEFAULT_EXPLORATION_CONCURRENCY,
  exploreDesignSpace,
  type DesignCandidate,
  type ExplorationRecord,
  type ExploreOptions
} from './design-space.js';
