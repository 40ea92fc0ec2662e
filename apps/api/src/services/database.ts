import pg from 'pg';
import type { Pool, PoolConfig } from 'pg';
import { logger } from '../utils/logger.js';
import type { HardFilter } from '@travel-search/types';
import type { Config } from '../config/index.js';

export const FRAGMENTS_TABLE = 'travel_fragments';

// Attributes the filter selector can push down; each gets an expression index
export const FILTERABLE_ATTRIBUTES: readonly HardFilter['field'][] = [
  'destination',
  'travel_month',
  'season',
  'category',
  'price_range',
  'subcategory',
];

export function createPool(config: Config['store']): Pool {
  const poolConfig: PoolConfig = {
    connectionString: config.databaseUrl,
    max: config.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    // Client-side timeout; a slow kNN query is reported as a store failure
    query_timeout: config.queryTimeoutMs,
  };

  const pool = new pg.Pool(poolConfig);

  pool.on('error', (error) => {
    logger.error({ error: error.message }, 'Unexpected error on idle PostgreSQL client');
  });

  return pool;
}

async function hasTable(pool: Pool): Promise<boolean> {
  const result = await pool.query<{ exists: boolean }>(
    `SELECT EXISTS (
       SELECT 1 FROM information_schema.tables
       WHERE table_schema = 'public' AND table_name = $1
     ) AS exists`,
    [FRAGMENTS_TABLE]
  );
  return result.rows[0]?.exists ?? false;
}

// Create the pgvector extension, table and indexes when missing
export async function ensureSchema(pool: Pool, dimensions: number): Promise<void> {
  if (await hasTable(pool)) {
    logger.info({ table: FRAGMENTS_TABLE }, 'Fragment table already exists, skipping schema creation');
    return;
  }

  logger.info({ table: FRAGMENTS_TABLE, dimensions }, 'No fragment table found, creating schema...');

  await pool.query('CREATE EXTENSION IF NOT EXISTS vector');
  await pool.query(`
    CREATE TABLE IF NOT EXISTS ${FRAGMENTS_TABLE} (
      id TEXT PRIMARY KEY,
      body TEXT NOT NULL,
      source TEXT NOT NULL,
      attributes JSONB NOT NULL DEFAULT '{}'::jsonb,
      embedding vector(${dimensions}) NOT NULL,
      created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW(),
      updated_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
    )
  `);

  await pool.query(
    `CREATE INDEX IF NOT EXISTS idx_${FRAGMENTS_TABLE}_embedding ON ${FRAGMENTS_TABLE} USING hnsw (embedding vector_cosine_ops)`
  );
  await pool.query(`CREATE INDEX IF NOT EXISTS idx_${FRAGMENTS_TABLE}_source ON ${FRAGMENTS_TABLE}(source)`);
  for (const attribute of FILTERABLE_ATTRIBUTES) {
    await pool.query(
      `CREATE INDEX IF NOT EXISTS idx_${FRAGMENTS_TABLE}_${attribute} ON ${FRAGMENTS_TABLE} ((attributes->>'${attribute}'))`
    );
  }

  logger.info('✅ Fragment schema created successfully');
}

export async function connectDatabase(pool: Pool, dimensions: number): Promise<void> {
  try {
    await pool.query('SELECT 1');
    logger.info('✅ Database connected successfully');
    await ensureSchema(pool, dimensions);
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, '❌ Database connection failed');
    throw error;
  }
}

export async function disconnectDatabase(pool: Pool): Promise<void> {
  try {
    await pool.end();
    logger.info('Database disconnected');
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Error disconnecting from database');
  }
}
