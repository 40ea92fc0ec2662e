import type { Embedder } from '../src/embeddings/index.js';
import type { FragmentAttributes, HardFilter, SourceSummary, StoreStats } from '@travel-search/types';
import type { CandidateStore, RawCandidate, StoredFragment } from '../src/store/types.js';

/**
 * Deterministic embedder: known texts map to fixed vectors, anything else
 * to `fallbackVector`.
 */
export class FakeEmbedder implements Embedder {
  calls: string[][] = [];

  constructor(
    private vectors: Record<string, number[]> = {},
    private fallbackVector: number[] = [1, 0, 0],
    private available = true
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return texts.map(text => this.vectors[text] ?? this.fallbackVector);
  }

  async embedSingle(text: string): Promise<number[]> {
    const [embedding] = await this.embed([text]);
    return embedding ?? this.fallbackVector;
  }

  getModel(): string {
    return 'fake-embedding';
  }

  getDimensions(): number {
    return this.fallbackVector.length;
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }
}

export class FailingEmbedder extends FakeEmbedder {
  constructor(private error: Error) {
    super();
  }

  override async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    throw this.error;
  }
}

/**
 * Store that returns canned candidates and records every query.
 */
export class StubCandidateStore implements CandidateStore {
  queries: Array<{ vector: number[]; k: number; filter: HardFilter | null }> = [];

  constructor(private candidates: RawCandidate[] = [], private failure?: Error) {}

  async query(vector: number[], k: number, filter?: HardFilter | null): Promise<RawCandidate[]> {
    this.queries.push({ vector, k, filter: filter ?? null });
    if (this.failure) {
      throw this.failure;
    }
    return this.candidates.slice(0, k);
  }

  async upsert(fragments: StoredFragment[]): Promise<number> {
    return fragments.length;
  }

  async deleteBySource(): Promise<number> {
    return 0;
  }

  async clear(): Promise<number> {
    return 0;
  }

  async listSources(): Promise<SourceSummary[]> {
    if (this.failure) {
      throw this.failure;
    }
    return [];
  }

  async sourceInfo(): Promise<SourceSummary | null> {
    return null;
  }

  async stats(): Promise<StoreStats> {
    return { total_fragments: this.candidates.length, categories: [], destinations: [], sources: [] };
  }

  async ping(): Promise<boolean> {
    return !this.failure;
  }

  async close(): Promise<void> {}
}

/**
 * A candidate whose store distance maps back to `similarity` as base score.
 */
export function candidateWithSimilarity(
  id: string,
  similarity: number,
  attributes: FragmentAttributes = {}
): RawCandidate {
  return {
    id,
    body: `Fragment ${id}`,
    attributes,
    distance: 1 / similarity - 1,
  };
}

export function fragment(
  id: string,
  embedding: number[],
  attributes: FragmentAttributes = {},
  source = 'guide.pdf'
): StoredFragment {
  return { id, body: `Fragment ${id}`, source, attributes, embedding };
}
