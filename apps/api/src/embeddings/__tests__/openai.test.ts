import { describe, it, expect, vi, beforeEach } from 'vitest';

const { create, constructorArgs } = vi.hoisted(() => {
  const constructorArgs: unknown[] = [];
  return { create: vi.fn(), constructorArgs };
});

vi.mock('openai', () => ({
  default: class {
    embeddings = { create };

    constructor(options: unknown) {
      constructorArgs.push(options);
    }
  },
}));

import { OpenAIEmbedder } from '../providers/openai.js';
import { EmbeddingError } from '../types.js';

describe('OpenAIEmbedder', () => {
  beforeEach(() => {
    create.mockReset();
    constructorArgs.length = 0;
  });

  it('should pass the key and base URL to the client', () => {
    new OpenAIEmbedder({
      apiKey: 'test-secret',
      baseUrl: 'http://localhost:8080/v1',
      model: 'text-embedding-3-small',
      dimensions: 3,
    });

    expect(constructorArgs).toEqual([{ apiKey: 'test-secret', baseURL: 'http://localhost:8080/v1' }]);
  });

  it('should return embeddings in input order', async () => {
    create.mockResolvedValue({
      data: [
        { index: 1, embedding: [0, 1, 0] },
        { index: 0, embedding: [1, 0, 0] },
      ],
      usage: { total_tokens: 4 },
    });
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret', model: 'text-embedding-3-small', dimensions: 3 });

    const embeddings = await embedder.embed(['first', 'second']);

    expect(embeddings).toEqual([[1, 0, 0], [0, 1, 0]]);
    expect(create).toHaveBeenCalledWith({
      model: 'text-embedding-3-small',
      input: ['first', 'second'],
      dimensions: 3,
    });
  });

  it('should split large inputs into batches', async () => {
    create.mockImplementation(async ({ input }: { input: string[] }) => ({
      data: input.map((_, index) => ({ index, embedding: [index] })),
    }));
    const embedder = new OpenAIEmbedder({
      apiKey: 'test-secret',
      model: 'text-embedding-3-small',
      dimensions: 1,
      batchSize: 2,
    });

    const embeddings = await embedder.embed(['a', 'b', 'c']);

    expect(create).toHaveBeenCalledTimes(2);
    expect(embeddings).toEqual([[0], [1], [0]]);
  });

  it('should wrap API failures in EmbeddingError', async () => {
    create.mockRejectedValue(new Error('401 Unauthorized'));
    const embedder = new OpenAIEmbedder({
      apiKey: 'test-secret',
      model: 'text-embedding-3-small',
      dimensions: 3,
      label: 'openai-compatible',
    });

    const error = await embedder.embedSingle('q').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingError);
    expect(error).toMatchObject({
      message: 'OpenAI embedding failed: 401 Unauthorized',
      provider: 'openai-compatible',
    });
  });

  it('should fail when the API returns too few embeddings', async () => {
    create.mockResolvedValue({ data: [{ index: 0, embedding: [1] }] });
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret', model: 'text-embedding-3-small', dimensions: 1 });

    await expect(embedder.embed(['a', 'b'])).rejects.toThrow('Expected 2 embeddings, received 1');
  });

  it('should only be available with a key', async () => {
    const withKey = new OpenAIEmbedder({ apiKey: 'test-secret', model: 'm', dimensions: 1 });
    const withoutKey = new OpenAIEmbedder({ apiKey: ' ', model: 'm', dimensions: 1 });

    expect(await withKey.isAvailable()).toBe(true);
    expect(await withoutKey.isAvailable()).toBe(false);
    expect(create).not.toHaveBeenCalled();
  });
});
