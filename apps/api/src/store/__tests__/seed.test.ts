import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { ZodError } from 'zod';
import { FragmentFileSchema, loadFragmentFile, seedFragments } from '../seed.js';
import { InMemoryCandidateStore } from '../memory-store.js';
import { FailingEmbedder, FakeEmbedder } from '../../../test/fakes.js';

const seedFile = fileURLToPath(new URL('../../../data/travel_fragments.json', import.meta.url));

describe('loadFragmentFile', () => {
  it('should load the bundled fragments', async () => {
    const fragments = await loadFragmentFile(seedFile);

    expect(fragments).toHaveLength(12);
    expect(fragments[0]).toMatchObject({
      id: 'rome-food-01',
      source: 'rome-guide.pdf',
      attributes: { destination: 'Rome', price_range: 'moderate', duration_days: 5, page_number: 12 },
    });
  });
});

describe('FragmentFileSchema', () => {
  it('should default attributes and drop nested values', () => {
    const [fragment] = FragmentFileSchema.parse([
      { id: 'a', body: 'Body', source: 's.pdf' },
    ]);
    const [nested] = FragmentFileSchema.parse([
      { id: 'b', body: 'Body', source: 's.pdf', attributes: { destination: 'Oslo', geo: { lat: 59.9 } } },
    ]);

    expect(fragment?.attributes).toEqual({});
    expect(nested?.attributes).toEqual({ destination: 'Oslo' });
  });

  it('should reject fragments without a source', () => {
    expect(() => FragmentFileSchema.parse([{ id: 'a', body: 'Body' }])).toThrow(ZodError);
  });
});

describe('seedFragments', () => {
  const records = [
    { id: 'one', body: 'first', source: 'a.pdf', attributes: { destination: 'Oslo' } },
    { id: 'two', body: 'second', source: 'a.pdf', attributes: {} },
    { id: 'three', body: 'third', source: 'b.pdf', attributes: {} },
  ];

  it('should embed in batches and upsert every fragment', async () => {
    const embedder = new FakeEmbedder({ first: [1, 0], second: [0, 1] }, [1, 1]);
    const store = new InMemoryCandidateStore();

    const stored = await seedFragments(records, embedder, store, 2);

    expect(stored).toBe(3);
    expect(embedder.calls).toEqual([['first', 'second'], ['third']]);
    expect((await store.stats()).total_fragments).toBe(3);

    const [nearest] = await store.query([0, 1], 1);
    expect(nearest?.id).toBe('two');
  });

  it('should stop when embedding fails', async () => {
    const store = new InMemoryCandidateStore();

    await expect(
      seedFragments(records, new FailingEmbedder(new Error('quota exceeded')), store)
    ).rejects.toThrow('quota exceeded');
    expect((await store.stats()).total_fragments).toBe(0);
  });
});
