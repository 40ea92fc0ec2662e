import 'dotenv/config';
import { loadConfig, logger } from '../src/config/index.js';
import { createEmbeddingService } from '../src/embeddings/index.js';
import { connectDatabase, createPool } from '../src/services/database.js';
import { PgVectorCandidateStore } from '../src/store/pgvector-store.js';
import { DEFAULT_SEED_FILE, loadFragmentFile, seedFragments } from '../src/store/seed.js';

async function main() {
  const config = loadConfig();
  if (config.store.kind !== 'pgvector') {
    throw new Error('Seeding writes to PostgreSQL; set CANDIDATE_STORE=pgvector');
  }

  const pool = createPool(config.store);
  const store = new PgVectorCandidateStore(pool);

  try {
    logger.info('🌱 Starting fragment seeding...');
    await connectDatabase(pool, config.embeddings.dimensions);

    const fragments = await loadFragmentFile(process.argv[2] ?? config.store.seedFile ?? DEFAULT_SEED_FILE);
    if (fragments.length === 0) {
      logger.warn('No fragments found in seed file');
      return;
    }

    const stored = await seedFragments(fragments, createEmbeddingService(config.embeddings), store);
    const stats = await store.stats();
    logger.info({ stored, total: stats.total_fragments }, '✅ Seeding complete');
  } finally {
    await store.close();
  }
}

main().catch((error) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, '❌ Seeding failed');
  process.exit(1);
});
