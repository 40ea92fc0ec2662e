import 'dotenv/config';
import { loadConfig, logger } from './config/index.js';
import { createEmbeddingService } from './embeddings/index.js';
import { TravelSearchEngine } from './engine/search-engine.js';
import { buildServer } from './server.js';
import { createCandidateStore } from './store/factory.js';

const config = loadConfig();

const embedder = createEmbeddingService(config.embeddings);
const store = await createCandidateStore(config, embedder);
const engine = new TravelSearchEngine(embedder, store, {
  overfetchFactor: config.search.overfetchFactor,
});

const fastify = await buildServer({
  engine,
  embedder,
  store,
  search: config.search,
  nodeEnv: config.nodeEnv,
  frontendOrigin: config.server.frontendOrigin,
});

async function start() {
  try {
    const { port, host } = config.server;
    await fastify.listen({ port, host });
    logger.info(`Server listening on http://${host}:${port}`);
  } catch (error) {
    logger.error(error);
    await store.close();
    process.exit(1);
  }
}

// Graceful shutdown
async function shutdown() {
  logger.info('Shutting down server...');
  try {
    await fastify.close();
    await store.close();
    process.exit(0);
  } catch (error) {
    logger.error(error, 'Error during shutdown');
    process.exit(1);
  }
}

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

await start();
