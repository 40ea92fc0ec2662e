/**
 * PostgreSQL + pgvector candidate store
 *
 * kNN over `travel_fragments.embedding` with the cosine operator (`<=>`),
 * backed by the HNSW index. The optional hard filter becomes a single
 * equality predicate on `attributes->>field`.
 */

import type { QueryResult, QueryResultRow } from 'pg';
import type { AttributeValue, FragmentAttributes, HardFilter, SourceSummary, StoreStats } from '@travel-search/types';
import { logger } from '../config/index.js';
import { FILTERABLE_ATTRIBUTES, FRAGMENTS_TABLE } from '../services/database.js';
import { CandidateStore, CandidateStoreError, RawCandidate, StoredFragment, toError } from './types.js';

// Row shapes are type aliases so they satisfy pg's QueryResultRow index signature
type FragmentRow = {
  id: string;
  body: string;
  source: string;
  attributes: unknown;
  distance: number | string;
};

type SourceRow = {
  source: string;
  fragments: number;
};

export interface SqlQuery {
  text: string;
  values: unknown[];
}

/**
 * The slice of pg's Pool the store uses
 */
export interface SqlClient {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface PooledSqlClient extends SqlClient {
  release(): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<PooledSqlClient>;
  end(): Promise<void>;
}

// pgvector's default ef_search is 40, which also caps how many rows an HNSW scan returns
export const MIN_EF_SEARCH = 100;
export const MAX_EF_SEARCH = 1000;
const FILTERED_EF_SEARCH_MULTIPLIER = 4;

/**
 * Candidate list size for the HNSW scan. A filter is applied after the scan,
 * so filtered queries widen it to leave k matches after filtering.
 */
export function hnswEfSearch(k: number, filtered: boolean): number {
  const wanted = Math.ceil(filtered ? k * FILTERED_EF_SEARCH_MULTIPLIER : k);
  return Math.min(MAX_EF_SEARCH, Math.max(wanted, MIN_EF_SEARCH));
}

export function toVectorLiteral(vector: number[]): string {
  if (vector.some(component => !Number.isFinite(component))) {
    throw new Error('Vector contains non-finite components');
  }
  return `[${vector.join(',')}]`;
}

export function buildKnnQuery(vector: number[], k: number, filter?: HardFilter | null): SqlQuery {
  const values: unknown[] = [toVectorLiteral(vector), k];
  let where = '';

  if (filter) {
    // Field names come from a closed set; inlining them lets the expression indexes apply
    if (!FILTERABLE_ATTRIBUTES.includes(filter.field)) {
      throw new Error(`Attribute ${filter.field} cannot be used as a filter`);
    }
    values.push(filter.value);
    where = `WHERE attributes->>'${filter.field}' = $3`;
  }

  return {
    text: `SELECT id, body, source, attributes, embedding <=> $1::vector AS distance
      FROM ${FRAGMENTS_TABLE}
      ${where}
      ORDER BY embedding <=> $1::vector
      LIMIT $2`,
    values,
  };
}

function toAttributeValue(value: unknown): AttributeValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return undefined;
}

/**
 * Keep the JSON entries that fit the attribute model; nested objects are dropped.
 */
export function sanitizeAttributes(raw: unknown): FragmentAttributes {
  const attributes: FragmentAttributes = {};
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return attributes;
  }

  for (const [key, value] of Object.entries(raw)) {
    const attribute = toAttributeValue(value);
    if (attribute !== undefined) {
      attributes[key] = attribute;
    }
  }
  return attributes;
}

export function rowToCandidate(row: FragmentRow): RawCandidate {
  return {
    id: row.id,
    body: row.body,
    attributes: { ...sanitizeAttributes(row.attributes), source: row.source },
    distance: Number(row.distance),
  };
}

export class PgVectorCandidateStore implements CandidateStore {
  constructor(private pool: SqlPool) {}

  async query(vector: number[], k: number, filter?: HardFilter | null): Promise<RawCandidate[]> {
    if (k <= 0) return [];

    const startTime = Date.now();
    try {
      const { text, values } = buildKnnQuery(vector, k, filter);
      const efSearch = hnswEfSearch(k, Boolean(filter));

      const rows = await this.transaction(async client => {
        // SET takes no bind parameters; efSearch is a computed integer
        await client.query(`SET LOCAL hnsw.ef_search = ${efSearch}`);
        const result = await client.query<FragmentRow>(text, values);
        return result.rows;
      });

      logger.debug({
        k,
        filter,
        efSearch,
        rows: rows.length,
        duration: Date.now() - startTime
      }, 'pgvector kNN query completed');

      return rows.map(rowToCandidate);
    } catch (error) {
      throw new CandidateStoreError('pgvector kNN query failed', 'query', toError(error));
    }
  }

  async upsert(fragments: StoredFragment[]): Promise<number> {
    if (fragments.length === 0) return 0;

    try {
      await this.transaction(async client => {
        for (const fragment of fragments) {
          await client.query(
            `INSERT INTO ${FRAGMENTS_TABLE} (id, body, source, attributes, embedding)
             VALUES ($1, $2, $3, $4::jsonb, $5::vector)
             ON CONFLICT (id) DO UPDATE SET
               body = EXCLUDED.body,
               source = EXCLUDED.source,
               attributes = EXCLUDED.attributes,
               embedding = EXCLUDED.embedding,
               updated_at = NOW()`,
            [
              fragment.id,
              fragment.body,
              fragment.source,
              JSON.stringify(fragment.attributes),
              toVectorLiteral(fragment.embedding),
            ]
          );
        }
      });
      return fragments.length;
    } catch (error) {
      throw new CandidateStoreError('Fragment upsert failed', 'upsert', toError(error));
    }
  }

  async deleteBySource(source: string): Promise<number> {
    try {
      const result = await this.pool.query(`DELETE FROM ${FRAGMENTS_TABLE} WHERE source = $1`, [source]);
      return result.rowCount ?? 0;
    } catch (error) {
      throw new CandidateStoreError(`Failed to delete fragments of ${source}`, 'delete', toError(error));
    }
  }

  async clear(): Promise<number> {
    try {
      const result = await this.pool.query(`DELETE FROM ${FRAGMENTS_TABLE}`);
      const deleted = result.rowCount ?? 0;
      logger.warn({ deleted }, 'Cleared every fragment from the store');
      return deleted;
    } catch (error) {
      throw new CandidateStoreError('Failed to clear the store', 'delete', toError(error));
    }
  }

  async listSources(): Promise<SourceSummary[]> {
    try {
      const result = await this.pool.query<SourceRow>(
        `SELECT source, COUNT(*)::int AS fragments FROM ${FRAGMENTS_TABLE}
         GROUP BY source
         ORDER BY source`
      );
      return result.rows;
    } catch (error) {
      throw new CandidateStoreError('Failed to list sources', 'list', toError(error));
    }
  }

  async sourceInfo(source: string): Promise<SourceSummary | null> {
    try {
      const result = await this.pool.query<{ fragments: number }>(
        `SELECT COUNT(*)::int AS fragments FROM ${FRAGMENTS_TABLE} WHERE source = $1`,
        [source]
      );
      const fragments = result.rows[0]?.fragments ?? 0;
      return fragments > 0 ? { source, fragments } : null;
    } catch (error) {
      throw new CandidateStoreError(`Failed to look up source ${source}`, 'list', toError(error));
    }
  }

  async stats(): Promise<StoreStats> {
    try {
      const [total, categories, destinations, sources] = await Promise.all([
        this.pool.query<{ count: number }>(`SELECT COUNT(*)::int AS count FROM ${FRAGMENTS_TABLE}`),
        this.distinct(`attributes->>'category'`),
        this.distinct(`attributes->>'destination'`),
        this.distinct('source'),
      ]);

      return {
        total_fragments: total.rows[0]?.count ?? 0,
        categories,
        destinations,
        sources,
      };
    } catch (error) {
      throw new CandidateStoreError('Failed to collect store statistics', 'stats', toError(error));
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.warn({ error: toError(error).message }, 'pgvector store ping failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async distinct(expression: string): Promise<string[]> {
    const result = await this.pool.query<{ value: string }>(
      `SELECT DISTINCT ${expression} AS value FROM ${FRAGMENTS_TABLE}
       WHERE ${expression} IS NOT NULL AND ${expression} <> ''
       ORDER BY value`
    );
    return result.rows.map(row => row.value);
  }

  private async transaction<T>(work: (client: PooledSqlClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
