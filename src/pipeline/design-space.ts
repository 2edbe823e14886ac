/**
 * Design-Space Exploration
 *
 * Runs independent pipeline candidates through a bounded async work queue.
 * Candidates share no mutable state; one failing candidate never stops the others.
 */

import { ConfigError } from '../shared/errors.js';
import { EngineLogger } from '../shared/logger.js';
import type { Requirements } from '../shared/types/requirements.js';
import { runTopologyPipeline, type PipelineOptions, type PipelineResult } from './topology-pipeline.js';

export interface DesignCandidate {
  id: string;
  requirements: Requirements;
  /** Merged over the shared exploration options */
  options?: PipelineOptions;
}

export type ExplorationRecord =
  | { id: string; status: 'fulfilled'; result: PipelineResult; durationMs: number }
  | { id: string; status: 'rejected'; error: Error; durationMs: number };

export interface ExploreOptions extends PipelineOptions {
  /** Candidates in flight at once (default 4) */
  concurrency?: number;
}

export const DEFAULT_EXPLORATION_CONCURRENCY = 4;

/**
 * Run every candidate; records come back in candidate order
 */
export async function exploreDesignSpace(
  candidates: readonly DesignCandidate[],
  options: ExploreOptions = {}
): Promise<ExplorationRecord[]> {
  const { concurrency = DEFAULT_EXPLORATION_CONCURRENCY, ...shared } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`Exploration concurrency must be a positive integer, got ${concurrency}`);
  }

  const records: ExplorationRecord[] = new Array(candidates.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < candidates.length) {
      const index = next++;
      const candidate = candidates[index];
      const started = Date.now();
      try {
        const result = await runTopologyPipeline(candidate.requirements, {
          ...shared,
          ...candidate.options,
          config: { ...shared.config, ...candidate.options?.config },
        });
        records[index] = { id: candidate.id, status: 'fulfilled', result, durationMs: Date.now() - started };
      } catch (error) {
        records[index] = {
          id: candidate.id,
          status: 'rejected',
          error: error instanceof Error ? error : new Error(String(error)),
          durationMs: Date.now() - started,
        };
      }
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, candidates.length) }, () => worker());
  await Promise.all(workers);

  const failed = records.filter((record) => record.status === 'rejected').length;
  EngineLogger.info(`design-space exploration: ${candidates.length - failed}/${candidates.length} candidates succeeded`);
  return records;
}
