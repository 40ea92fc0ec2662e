/**
 * Travel search pipeline
 *
 * 1. Embed the query text (failures propagate)
 * 2. Choose one constraint as the store's hard filter
 * 3. Over-fetch kNN candidates (store failures degrade to zero candidates)
 * 4. Soft-score the remaining constraints
 * 5. Threshold, sort and truncate
 */

import type { Logger } from 'pino';
import type { HardFilter, SearchResponse, SearchResultItem } from '@travel-search/types';
import { createChildLogger } from '../utils/logger.js';
import type { Embedder } from '../embeddings/index.js';
import type { CandidateStore, RawCandidate } from '../store/types.js';
import { ConstraintSet, constraintCount } from './constraints.js';
import { selectHardFilter } from './filter-priority.js';
import { SoftScorer } from './soft-scorer.js';
import { assembleResults } from './assemble.js';
import type { PenaltyWeights } from './penalties.js';

export const DEFAULT_OVERFETCH_FACTOR = 3;

export interface SearchEngineOptions {
  /** Raw candidates requested per returned result */
  overfetchFactor?: number;
  weights?: Partial<PenaltyWeights>;
}

export interface SearchParams {
  query: string;
  constraints: ConstraintSet;
  limit: number;
  threshold: number;
}

/**
 * Store distance (cosine, ≥ 0) → similarity in (0, 1]
 */
export function distanceToSimilarity(distance: number): number {
  if (!Number.isFinite(distance)) return 0;
  return 1 / (1 + Math.max(0, distance));
}

export class TravelSearchEngine {
  private embedder: Embedder;
  private store: CandidateStore;
  private readonly scorer: SoftScorer;
  private overfetchFactor: number;

  constructor(embedder: Embedder, store: CandidateStore, options: SearchEngineOptions = {}) {
    const overfetchFactor = options.overfetchFactor ?? DEFAULT_OVERFETCH_FACTOR;
    if (!Number.isInteger(overfetchFactor) || overfetchFactor < 1) {
      throw new RangeError(`overfetchFactor must be a positive integer, got ${overfetchFactor}`);
    }

    this.embedder = embedder;
    this.store = store;
    this.scorer = new SoftScorer(options.weights);
    this.overfetchFactor = overfetchFactor;
  }

  async search(params: SearchParams): Promise<SearchResponse> {
    const startTime = performance.now();
    const { query, constraints, limit, threshold } = params;

    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }
    if (!(threshold >= 0 && threshold <= 1)) {
      throw new RangeError(`threshold must be within [0, 1], got ${threshold}`);
    }

    const log = createChildLogger({ query: query.substring(0, 80) });

    let vector: number[];
    try {
      vector = await this.embedder.embedSingle(query);
    } catch (error) {
      log.error({ error: error instanceof Error ? error.message : String(error) }, 'Query embedding failed');
      throw error;
    }

    const hardFilter = selectHardFilter(constraints);
    const candidates = await this.fetchCandidates(vector, limit * this.overfetchFactor, hardFilter, log);

    const scores = candidates.map(candidate =>
      this.scorer.score(distanceToSimilarity(candidate.distance), candidate.attributes, constraints, hardFilter)
    );

    const results: SearchResultItem[] = assembleResults(candidates, scores, threshold, limit).map(
      ({ id, body, attributes, score }) => ({ id, body, attributes, score })
    );

    const processingTime = (performance.now() - startTime) / 1000;

    log.info({
      hardFilter,
      softConstraints: constraintCount(constraints) - (hardFilter ? 1 : 0),
      candidates: candidates.length,
      results: results.length,
      topScore: results[0]?.score ?? 0,
      processingTime
    }, 'Search completed');

    return {
      query,
      hard_filter: hardFilter,
      results,
      total_results: results.length,
      processing_time: processingTime,
    };
  }

  private async fetchCandidates(
    vector: number[],
    k: number,
    hardFilter: HardFilter | null,
    log: Logger
  ): Promise<RawCandidate[]> {
    try {
      const candidates = await this.store.query(vector, k, hardFilter);
      log.debug({ k, hardFilter, returned: candidates.length }, 'Fetched candidates');
      return candidates;
    } catch (error) {
      log.error({
        error: error instanceof Error ? error.message : String(error),
        k,
        hardFilter
      }, 'Candidate store query failed, continuing with no candidates');
      return [];
    }
  }
}
