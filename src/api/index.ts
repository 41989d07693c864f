import fastify from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { config } from '../config/env';
import { RATE_LIMIT_ALLOWLIST } from '../config/system/constants';
import { createMilvusStore } from '../db/milvus';
import { createEmbeddingClient } from '../services/embeddingClient';
import { SearchService, createSearchService } from '../services/searchService';
import { EmbeddingProvider, SearchStore } from '../types';
import { registerSearchRoutes } from './routes/search';
import { registerHealthRoutes } from './routes/health';
import { registerRootRoutes } from './routes/root';
import { createApiKeyGuard } from './hooks/auth';
import { searchErrorHandler } from './hooks/errors';

export interface ServerDeps {
  store?: SearchStore;
  embedder?: EmbeddingProvider;
  searchService?: SearchService;
}

export async function buildServer(deps: ServerDeps = {}) {
  const store = deps.store ?? createMilvusStore();
  const embedder = deps.embedder ?? createEmbeddingClient();
  const searchService = deps.searchService ?? createSearchService({ store, embedder });

  const app = fastify({
    logger: {
      level: config.LOG_LEVEL,
      transport: config.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined,
      redact: ['req.headers.authorization', 'req.headers["x-api-key"]']
    }
  });

  await app.register(helmet, { contentSecurityPolicy: false });

  await app.register(cors, {
    origin: config.corsOrigins.length > 0 ? config.corsOrigins : true
  });

  await app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: config.RATE_LIMIT_WINDOW,
    allowList: RATE_LIMIT_ALLOWLIST
  });

  app.setErrorHandler(searchErrorHandler);
  app.addHook('onRequest', createApiKeyGuard(config.API_KEY));
  await registerRootRoutes(app);
  await registerHealthRoutes(app, { store, embeddingConfigured: config.GEMINI_API_KEY.length > 0 });
  await registerSearchRoutes(app, searchService);

  return app;
}

if (process.env.NODE_ENV !== 'test') {
  buildServer()
    .then((app) =>
      app.listen({ port: config.PORT, host: '0.0.0.0' }).then(() => {
        app.log.info(`search API running on ${config.PORT}`);
      })
    )
    .catch((err) => {
      // eslint-disable-next-line no-console
      console.error('Failed to start server', err);
      process.exit(1);
    });
}
