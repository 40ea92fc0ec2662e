/**
 * In-process candidate store
 *
 * Exhaustive cosine search over fragments held in memory. Used for local
 * development (CANDIDATE_STORE=memory) and as the stand-in store in tests.
 */

import type { AttributeValue, HardFilter, SourceSummary, StoreStats } from '@travel-search/types';
import { vectorUtils } from '../embeddings/index.js';
import { logger } from '../config/index.js';
import { CandidateStore, CandidateStoreError, RawCandidate, StoredFragment, toError } from './types.js';

function matchesFilter(value: AttributeValue | undefined, filter: HardFilter): boolean {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value) === filter.value;
  }
  return false;
}

function distinctStrings(values: Array<AttributeValue | undefined>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    if (typeof value === 'string' && value.trim() !== '') {
      seen.add(value);
    }
  }
  return [...seen].sort();
}

export class InMemoryCandidateStore implements CandidateStore {
  private fragments = new Map<string, StoredFragment>();

  constructor(fragments: StoredFragment[] = []) {
    for (const fragment of fragments) {
      this.fragments.set(fragment.id, fragment);
    }
  }

  async query(vector: number[], k: number, filter?: HardFilter | null): Promise<RawCandidate[]> {
    if (k <= 0) return [];

    try {
      const scored: RawCandidate[] = [];

      for (const fragment of this.fragments.values()) {
        if (filter && !matchesFilter(fragment.attributes[filter.field], filter)) {
          continue;
        }

        const distance = vectorUtils.cosineDistance(vector, fragment.embedding);
        scored.push({
          id: fragment.id,
          body: fragment.body,
          attributes: { ...fragment.attributes, source: fragment.source },
          distance,
        });
      }

      return scored
        .sort((a, b) => a.distance - b.distance)
        .slice(0, k);
    } catch (error) {
      throw new CandidateStoreError('In-memory kNN query failed', 'query', toError(error));
    }
  }

  async upsert(fragments: StoredFragment[]): Promise<number> {
    for (const fragment of fragments) {
      this.fragments.set(fragment.id, fragment);
    }
    logger.debug({ count: fragments.length, total: this.fragments.size }, 'Upserted fragments into memory store');
    return fragments.length;
  }

  async deleteBySource(source: string): Promise<number> {
    let removed = 0;
    for (const [id, fragment] of this.fragments) {
      if (fragment.source === source) {
        this.fragments.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async clear(): Promise<number> {
    const removed = this.fragments.size;
    this.fragments.clear();
    return removed;
  }

  async listSources(): Promise<SourceSummary[]> {
    const counts = new Map<string, number>();
    for (const fragment of this.fragments.values()) {
      counts.set(fragment.source, (counts.get(fragment.source) ?? 0) + 1);
    }
    return [...counts.keys()]
      .sort()
      .map(source => ({ source, fragments: counts.get(source) ?? 0 }));
  }

  async sourceInfo(source: string): Promise<SourceSummary | null> {
    let fragments = 0;
    for (const fragment of this.fragments.values()) {
      if (fragment.source === source) fragments++;
    }
    return fragments > 0 ? { source, fragments } : null;
  }

  async stats(): Promise<StoreStats> {
    const fragments = [...this.fragments.values()];
    return {
      total_fragments: fragments.length,
      categories: distinctStrings(fragments.map(f => f.attributes.category)),
      destinations: distinctStrings(fragments.map(f => f.attributes.destination)),
      sources: distinctStrings(fragments.map(f => f.source)),
    };
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.fragments.clear();
  }
}
