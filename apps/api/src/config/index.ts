import { loadServerEnv, type ServerEnv } from './env.js';
import { logger } from '../utils/logger.js';

export interface Config {
  server: {
    port: number;
    host: string;
    frontendOrigin: string;
  };
  store: {
    kind: 'pgvector' | 'memory';
    databaseUrl?: string;
    queryTimeoutMs: number;
    poolMax: number;
    // Fragment file loaded into the in-memory store at startup
    seedFile?: string;
  };
  embeddings: {
    model: string;
    dimensions: number;
    openai?: {
      apiKey: string;
    };
    fallback?: {
      baseUrl: string;
      apiKey: string;
    };
  };
  search: {
    overfetchFactor: number;
    defaultLimit: number;
    maxLimit: number;
    defaultThreshold: number;
  };
  nodeEnv: ServerEnv['NODE_ENV'];
}

export function buildConfig(env: ServerEnv): Config {
  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      frontendOrigin: env.FRONTEND_ORIGIN,
    },
    store: {
      kind: env.CANDIDATE_STORE,
      databaseUrl: env.DATABASE_URL,
      queryTimeoutMs: env.PG_QUERY_TIMEOUT_MS,
      poolMax: env.PG_POOL_MAX,
      seedFile: env.SEED_FILE,
    },
    embeddings: {
      model: env.EMBEDDING_MODEL,
      dimensions: env.EMBEDDING_DIMENSIONS,
      openai: env.OPENAI_API_KEY ? { apiKey: env.OPENAI_API_KEY } : undefined,
      fallback: env.EMBEDDING_FALLBACK_BASE_URL
        ? {
            baseUrl: env.EMBEDDING_FALLBACK_BASE_URL,
            // Self-hosted OpenAI-compatible servers often ignore the key
            apiKey: env.EMBEDDING_FALLBACK_API_KEY ?? env.OPENAI_API_KEY ?? 'unused',
          }
        : undefined,
    },
    search: {
      overfetchFactor: env.SEARCH_OVERFETCH_FACTOR,
      defaultLimit: env.SEARCH_DEFAULT_LIMIT,
      maxLimit: env.SEARCH_MAX_LIMIT,
      defaultThreshold: env.SEARCH_DEFAULT_THRESHOLD,
    },
    nodeEnv: env.NODE_ENV,
  };
}

// Lazy-loaded configuration - doesn't evaluate env at import time
let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = buildConfig(loadServerEnv());

  logger.info({
    server: cachedConfig.server,
    store: cachedConfig.store.kind,
    embeddingModel: cachedConfig.embeddings.model,
    hasOpenAIKey: !!cachedConfig.embeddings.openai,
    hasFallbackEmbedder: !!cachedConfig.embeddings.fallback,
    search: cachedConfig.search,
    nodeEnv: cachedConfig.nodeEnv,
  }, 'Configuration loaded');

  return cachedConfig;
}

export { logger } from '../utils/logger.js';
