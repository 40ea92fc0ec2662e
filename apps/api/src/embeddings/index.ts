/**
 * Embedding subsystem - pluggable providers behind a single service with fallback.
 */

export * from './types.js';

export { OpenAIEmbedder } from './providers/openai.js';

export { EmbeddingService, createEmbeddingService } from './service.js';

export { VectorUtilities, vectorUtils } from './utils.js';
