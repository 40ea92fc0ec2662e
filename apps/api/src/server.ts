import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { SourceListResponse } from '@travel-search/types';
import { ZodError } from 'zod';
import { logger } from './config/index.js';
import type { Config } from './config/index.js';
import { EmbeddingError, type Embedder } from './embeddings/index.js';
import { parseConstraints } from './engine/constraints.js';
import type { TravelSearchEngine } from './engine/search-engine.js';
import type { CandidateStore } from './store/types.js';
import {
  createErrorResponse,
  createSearchRequestSchema,
  formatZodError,
  SourceParamsSchema,
  type SearchLimits,
} from './schemas/api.js';

export interface ServerDependencies {
  engine: TravelSearchEngine;
  embedder: Embedder;
  store: CandidateStore;
  search: SearchLimits;
  nodeEnv: Config['nodeEnv'];
  frontendOrigin: string;
  logLevel?: string;
}

export interface RequestLoggerOptions {
  level: string;
  transport?: {
    target: string;
    options: Record<string, unknown>;
  };
}

/**
 * Fastify's request logger follows the application log level
 */
export function createLoggerOptions(nodeEnv: Config['nodeEnv'], level: string): RequestLoggerOptions | false {
  if (level === 'silent') return false;

  return {
    level,
    ...(nodeEnv === 'development' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname,reqId,res,responseTime',
          messageFormat: '{msg}',
          translateTime: 'HH:MM:ss UTC',
        },
      },
    }),
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function buildServer(deps: ServerDependencies): Promise<FastifyInstance> {
  const { engine, store, nodeEnv } = deps;
  const searchRequestSchema = createSearchRequestSchema(deps.search);

  const fastify = Fastify({
    logger: createLoggerOptions(nodeEnv, deps.logLevel ?? logger.level),
  });

  await fastify.register(cors, {
    origin: (origin, callback) => {
      // Allow requests with no origin (curl, server-to-server)
      if (!origin) return callback(null, true);

      const allowedOrigins = deps.frontendOrigin
        .split(',')
        .map(o => o.trim())
        .filter(Boolean);

      if (nodeEnv === 'development') {
        const isDevelopmentOrigin = origin.includes('localhost') ||
                                    origin.includes('127.0.0.1') ||
                                    allowedOrigins.includes(origin);
        return callback(null, isDevelopmentOrigin);
      }

      callback(null, allowedOrigins.includes('*') || allowedOrigins.includes(origin));
    },
  });

  fastify.get('/health', async (_, reply) => {
    const startTime = Date.now();
    const [storeHealthy, embedderAvailable] = await Promise.all([
      store.ping(),
      deps.embedder.isAvailable(),
    ]);
    const body = {
      status: storeHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: nodeEnv,
      services: {
        candidateStore: storeHealthy ? 'healthy' : 'unhealthy',
        embeddings: embedderAvailable ? 'healthy' : 'unavailable',
      },
      responseTime: `${Date.now() - startTime}ms`,
    };

    if (!storeHealthy) {
      logger.error('Health check failed: candidate store unreachable');
    }
    return reply.code(storeHealthy ? 200 : 503).send(body);
  });

  // POST /api/search - constraint-aware semantic search
  fastify.post('/api/search', async (request, reply) => {
    const parsed = searchRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(
        createErrorResponse('Invalid request', 'Search request failed validation', 400, formatZodError(parsed.error))
      );
    }

    try {
      const constraints = parseConstraints(parsed.data.constraints);
      const response = await engine.search({
        query: parsed.data.query,
        constraints,
        limit: parsed.data.limit,
        threshold: parsed.data.threshold,
      });
      return reply.send(response);
    } catch (error) {
      if (error instanceof ZodError) {
        return reply.code(400).send(
          createErrorResponse('Invalid constraints', 'Constraint values failed validation', 400, formatZodError(error))
        );
      }
      if (error instanceof EmbeddingError) {
        logger.error({ error: error.message, provider: error.provider }, 'Embedding failed in /api/search');
        return reply.code(502).send(
          createErrorResponse('Embedding provider error', 'Could not embed the query', 502)
        );
      }

      logger.error({ error: errorMessage(error) }, 'Error in /api/search');
      return reply.code(500).send(createErrorResponse('Internal server error', 'Search failed', 500));
    }
  });

  fastify.get('/api/documents/stats', async (_, reply) => {
    try {
      return reply.send(await store.stats());
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error in /api/documents/stats');
      return reply.code(500).send(createErrorResponse('Internal server error', 'Failed to get stats', 500));
    }
  });

  fastify.get('/api/documents/categories', async (_, reply) => {
    try {
      const { categories } = await store.stats();
      return reply.send({ categories });
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error in /api/documents/categories');
      return reply.code(500).send(createErrorResponse('Internal server error', 'Failed to get categories', 500));
    }
  });

  fastify.get('/api/documents/destinations', async (_, reply) => {
    try {
      const { destinations } = await store.stats();
      return reply.send({ destinations });
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error in /api/documents/destinations');
      return reply.code(500).send(createErrorResponse('Internal server error', 'Failed to get destinations', 500));
    }
  });

  fastify.get('/api/documents/list', async (_, reply) => {
    try {
      const documents = await store.listSources();
      const body: SourceListResponse = { documents, total: documents.length };
      return reply.send(body);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error in /api/documents/list');
      return reply.code(500).send(createErrorResponse('Internal server error', 'Failed to list documents', 500));
    }
  });

  fastify.get('/api/documents/:source/info', async (request, reply) => {
    const params = SourceParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send(
        createErrorResponse('Invalid request', 'Source is required', 400, formatZodError(params.error))
      );
    }

    try {
      const info = await store.sourceInfo(params.data.source);
      if (!info) {
        return reply.code(404).send(
          createErrorResponse('Not found', `Document not found: ${params.data.source}`, 404)
        );
      }
      return reply.send(info);
    } catch (error) {
      logger.error({ error: errorMessage(error), source: params.data.source }, 'Error in /api/documents/:source/info');
      return reply.code(500).send(createErrorResponse('Internal server error', 'Failed to get document info', 500));
    }
  });

  // DELETE /api/documents - empties the store
  fastify.delete('/api/documents', async (_, reply) => {
    try {
      const deleted = await store.clear();
      logger.warn({ deleted }, 'Cleared candidate store');
      return reply.send({ deleted });
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error clearing candidate store');
      return reply.code(500).send(createErrorResponse('Internal server error', 'Failed to clear documents', 500));
    }
  });

  fastify.delete('/api/documents/:source', async (request, reply) => {
    const params = SourceParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send(
        createErrorResponse('Invalid request', 'Source is required', 400, formatZodError(params.error))
      );
    }

    try {
      const deleted = await store.deleteBySource(params.data.source);
      if (deleted === 0) {
        return reply.code(404).send(
          createErrorResponse('Not found', `No fragments found for source ${params.data.source}`, 404)
        );
      }
      logger.info({ source: params.data.source, deleted }, 'Deleted fragments');
      return reply.send({ source: params.data.source, deleted });
    } catch (error) {
      logger.error({ error: errorMessage(error), source: params.data.source }, 'Error deleting fragments');
      return reply.code(500).send(createErrorResponse('Internal server error', 'Failed to delete fragments', 500));
    }
  });

  return fastify;
}
