import type { Config } from '../config/index.js';
import { logger } from '../config/index.js';
import type { Embedder } from '../embeddings/index.js';
import { connectDatabase, createPool } from '../services/database.js';
import { InMemoryCandidateStore } from './memory-store.js';
import { PgVectorCandidateStore } from './pgvector-store.js';
import { DEFAULT_SEED_FILE, loadFragmentFile, seedFragments } from './seed.js';
import type { CandidateStore } from './types.js';

/**
 * Store selected by CANDIDATE_STORE. The in-memory store starts from the
 * seed file so that a fresh process has something to search.
 */
export async function createCandidateStore(config: Config, embedder: Embedder): Promise<CandidateStore> {
  if (config.store.kind === 'pgvector') {
    const pool = createPool(config.store);
    await connectDatabase(pool, config.embeddings.dimensions);
    return new PgVectorCandidateStore(pool);
  }

  logger.warn('Using in-memory candidate store; fragments are not persisted');
  const store = new InMemoryCandidateStore();

  if (!(await embedder.isAvailable())) {
    logger.warn('No embedding provider configured; in-memory store starts empty');
    return store;
  }

  const seedFile = config.store.seedFile ?? DEFAULT_SEED_FILE;
  const fragments = await loadFragmentFile(seedFile);
  const stored = await seedFragments(fragments, embedder, store);
  logger.info({ seedFile, stored }, 'Seeded in-memory candidate store');

  return store;
}
