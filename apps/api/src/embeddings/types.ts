/**
 * Embedding provider contracts
 */

export interface Embedder {
  /**
   * Generate embeddings for multiple texts, in input order
   */
  embed(texts: string[]): Promise<number[][]>;

  embedSingle(text: string): Promise<number[]>;

  getModel(): string;

  getDimensions(): number;

  /**
   * Cheap readiness check; must not throw
   */
  isAvailable(): Promise<boolean>;
}

export interface EmbedderConfig {
  model: string;
  dimensions: number;
  batchSize?: number;
}

export interface OpenAIEmbedderConfig extends EmbedderConfig {
  apiKey: string;
  baseUrl?: string;
  /** Provider label used in logs and errors */
  label?: EmbedderProvider;
}

export type EmbedderProvider = 'openai' | 'openai-compatible';

export interface EmbedderSlot {
  provider: EmbedderProvider;
  embedder: Embedder;
}

export interface EmbeddingServiceOptions {
  primary: EmbedderSlot;
  fallback?: EmbedderSlot;
}

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public provider: EmbedderProvider,
    public cause?: Error
  ) {
    super(message);
    this.name = 'EmbeddingError';
  }
}
