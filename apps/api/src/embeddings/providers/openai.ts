import OpenAI from 'openai';
import { logger } from '../../config/index.js';
import {
  Embedder,
  EmbedderProvider,
  OpenAIEmbedderConfig,
  EmbeddingError
} from '../types.js';

export class OpenAIEmbedder implements Embedder {
  private client: OpenAI;
  private config: OpenAIEmbedderConfig;
  private provider: EmbedderProvider;

  constructor(config: OpenAIEmbedderConfig) {
    const defaults = {
      model: 'text-embedding-3-small',
      dimensions: 1536, // Default for text-embedding-3-small
      batchSize: 100
    };

    this.config = {
      ...defaults,
      ...config
    };
    this.provider = this.config.label ?? 'openai';

    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
    });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    try {
      const batches = this.batchTexts(texts, this.config.batchSize || 100);
      const allEmbeddings: number[][] = [];

      for (const batch of batches) {
        const response = await this.client.embeddings.create({
          model: this.config.model,
          input: batch,
          dimensions: this.config.dimensions,
        });

        // The API may return items out of order; index is authoritative
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        allEmbeddings.push(...ordered.map(item => item.embedding));

        if (response.usage) {
          logger.debug({
            provider: this.provider,
            model: this.config.model,
            tokens: response.usage.total_tokens,
            texts: batch.length
          }, 'Generated embeddings');
        }
      }

      if (allEmbeddings.length !== texts.length) {
        throw new Error(`Expected ${texts.length} embeddings, received ${allEmbeddings.length}`);
      }

      return allEmbeddings;
    } catch (error) {
      logger.error({
        error: error instanceof Error ? error.message : String(error),
        provider: this.provider,
        textsCount: texts.length
      }, 'OpenAI embedding failed');
      throw new EmbeddingError(
        `OpenAI embedding failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        this.provider,
        error instanceof Error ? error : undefined
      );
    }
  }

  async embedSingle(text: string): Promise<number[]> {
    const [embedding] = await this.embed([text]);
    if (!embedding) {
      throw new EmbeddingError('OpenAI returned no embedding', this.provider);
    }
    return embedding;
  }

  getModel(): string {
    return this.config.model;
  }

  getDimensions(): number {
    return this.config.dimensions;
  }

  async isAvailable(): Promise<boolean> {
    return this.config.apiKey.trim() !== '';
  }

  private batchTexts(texts: string[], batchSize: number): string[][] {
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += batchSize) {
      batches.push(texts.slice(i, i + batchSize));
    }
    return batches;
  }
}
