import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../config/index.js';
import { parseServerEnv } from '../../config/env.js';
import { createCandidateStore } from '../factory.js';
import { InMemoryCandidateStore } from '../memory-store.js';
import { FakeEmbedder } from '../../../test/fakes.js';

function memoryConfig(seedFile?: string) {
  return buildConfig(parseServerEnv({ CANDIDATE_STORE: 'memory', SEED_FILE: seedFile }));
}

describe('createCandidateStore', () => {
  it('should seed the in-memory store from the bundled fragments', async () => {
    const embedder = new FakeEmbedder();

    const store = await createCandidateStore(memoryConfig(), embedder);

    expect(store).toBeInstanceOf(InMemoryCandidateStore);
    expect((await store.stats()).total_fragments).toBe(12);
    expect(await store.sourceInfo('rome-guide.pdf')).not.toBeNull();
    expect(embedder.calls).toHaveLength(1);
  });

  it('should start empty when no embedder is available', async () => {
    const embedder = new FakeEmbedder({}, [1, 0, 0], false);

    const store = await createCandidateStore(memoryConfig(), embedder);

    expect((await store.stats()).total_fragments).toBe(0);
    expect(embedder.calls).toEqual([]);
  });

  it('should fail when the seed file is missing', async () => {
    await expect(
      createCandidateStore(memoryConfig('/nonexistent/fragments.json'), new FakeEmbedder())
    ).rejects.toThrow('ENOENT');
  });
});
