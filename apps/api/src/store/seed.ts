import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { logger } from '../config/index.js';
import type { Embedder } from '../embeddings/index.js';
import { sanitizeAttributes } from './pgvector-store.js';
import type { CandidateStore, FragmentRecord, StoredFragment } from './types.js';

export const DEFAULT_SEED_FILE = fileURLToPath(new URL('../../data/travel_fragments.json', import.meta.url));

export const FragmentRecordSchema = z.object({
  id: z.string().min(1),
  body: z.string().min(1),
  source: z.string().min(1),
  attributes: z.record(z.unknown()).default({}).transform(sanitizeAttributes),
});

export const FragmentFileSchema = z.array(FragmentRecordSchema);

export async function loadFragmentFile(filePath: string): Promise<FragmentRecord[]> {
  const raw: unknown = JSON.parse(await readFile(filePath, 'utf8'));
  const fragments = FragmentFileSchema.parse(raw);
  logger.info({ filePath, count: fragments.length }, 'Loaded fragment file');
  return fragments;
}

/**
 * Embed fragment bodies in batches and upsert them. Returns the number stored.
 */
export async function seedFragments(
  fragments: FragmentRecord[],
  embedder: Embedder,
  store: CandidateStore,
  batchSize = 50
): Promise<number> {
  let stored = 0;

  for (let i = 0; i < fragments.length; i += batchSize) {
    const batch = fragments.slice(i, i + batchSize);
    const embeddings = await embedder.embed(batch.map(fragment => fragment.body));

    const withEmbeddings = batch.map((fragment, index): StoredFragment => {
      const embedding = embeddings[index];
      if (!embedding) {
        throw new Error(`No embedding returned for fragment ${fragment.id}`);
      }
      return { ...fragment, embedding };
    });

    stored += await store.upsert(withEmbeddings);
    logger.info(`Processed ${stored}/${fragments.length} fragments...`);
  }

  return stored;
}
