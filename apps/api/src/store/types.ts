import type { FragmentAttributes, HardFilter, SourceSummary, StoreStats } from '@travel-search/types';

export interface FragmentRecord {
  id: string;
  body: string;
  source: string;
  attributes: FragmentAttributes;
}

export interface StoredFragment extends FragmentRecord {
  embedding: number[];
}

/**
 * One kNN hit. `attributes` carries `source` alongside the stored metadata.
 */
export interface RawCandidate {
  id: string;
  body: string;
  attributes: FragmentAttributes;
  /** Cosine distance, 0 = identical direction */
  distance: number;
}

export interface CandidateStore {
  /**
   * k nearest fragments by cosine distance, ascending. With a filter only
   * fragments whose attribute equals `filter.value` exactly are considered.
   */
  query(vector: number[], k: number, filter?: HardFilter | null): Promise<RawCandidate[]>;

  upsert(fragments: StoredFragment[]): Promise<number>;

  deleteBySource(source: string): Promise<number>;

  /** Removes every fragment; resolves to the number removed */
  clear(): Promise<number>;

  /** Fragment counts per source, ordered by source */
  listSources(): Promise<SourceSummary[]>;

  /** null when no fragment carries this source */
  sourceInfo(source: string): Promise<SourceSummary | null>;

  stats(): Promise<StoreStats>;

  ping(): Promise<boolean>;

  close(): Promise<void>;
}

export class CandidateStoreError extends Error {
  constructor(
    message: string,
    public operation: 'query' | 'upsert' | 'delete' | 'list' | 'stats' | 'schema',
    public cause?: Error
  ) {
    super(message);
    this.name = 'CandidateStoreError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
