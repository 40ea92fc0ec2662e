import { logger } from '../config/index.js';
import type { Config } from '../config/index.js';
import {
  Embedder,
  EmbedderSlot,
  EmbeddingError,
  EmbeddingServiceOptions,
} from './types.js';
import { OpenAIEmbedder } from './providers/openai.js';

/**
 * Primary embedder with an optional fallback. Implements Embedder so the
 * search engine can take either a bare provider or the whole service.
 */
export class EmbeddingService implements Embedder {
  private primary: EmbedderSlot;
  private fallback?: EmbedderSlot;

  constructor(options: EmbeddingServiceOptions) {
    this.primary = options.primary;
    this.fallback = options.fallback;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    let lastError: Error | undefined;

    for (const slot of this.slots()) {
      try {
        const isAvailable = await slot.embedder.isAvailable();
        if (!isAvailable) {
          logger.warn({ provider: slot.provider }, 'Embedder unavailable, skipping');
          continue;
        }

        logger.debug({
          provider: slot.provider,
          textsCount: texts.length
        }, slot === this.primary ? 'Using primary embedder' : 'Using fallback embedder');

        return await slot.embedder.embed(texts);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        logger.warn({
          error: lastError.message,
          provider: slot.provider,
          textsCount: texts.length
        }, slot === this.primary ? 'Primary embedder failed, trying fallback' : 'Fallback embedder failed');
      }
    }

    throw new EmbeddingError(
      'All embedding providers failed',
      this.primary.provider,
      lastError
    );
  }

  async embedSingle(text: string): Promise<number[]> {
    const [embedding] = await this.embed([text]);
    if (!embedding) {
      throw new EmbeddingError('Provider returned no embedding', this.primary.provider);
    }
    return embedding;
  }

  getModel(): string {
    return this.primary.embedder.getModel();
  }

  getDimensions(): number {
    return this.primary.embedder.getDimensions();
  }

  async isAvailable(): Promise<boolean> {
    for (const slot of this.slots()) {
      if (await slot.embedder.isAvailable()) return true;
    }
    return false;
  }

  private slots(): EmbedderSlot[] {
    return this.fallback ? [this.primary, this.fallback] : [this.primary];
  }
}

export function createEmbeddingService(config: Config['embeddings']): EmbeddingService {
  if (!config.openai) {
    throw new EmbeddingError('OPENAI_API_KEY is required for the embedding service', 'openai');
  }

  const primary: EmbedderSlot = {
    provider: 'openai',
    embedder: new OpenAIEmbedder({
      apiKey: config.openai.apiKey,
      model: config.model,
      dimensions: config.dimensions,
    }),
  };

  const fallback: EmbedderSlot | undefined = config.fallback
    ? {
        provider: 'openai-compatible',
        embedder: new OpenAIEmbedder({
          apiKey: config.fallback.apiKey,
          baseUrl: config.fallback.baseUrl,
          model: config.model,
          dimensions: config.dimensions,
          label: 'openai-compatible',
        }),
      }
    : undefined;

  logger.info({
    primary: primary.provider,
    fallback: fallback?.provider
  }, 'Initializing embedding service');

  return new EmbeddingService({ primary, fallback });
}
