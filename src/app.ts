import Fastify from 'fastify';
import type { ServerOptions } from 'node:https';
import { randomUUID } from 'node:crypto';
import cors from '@fastify/cors';
import { config } from './config/index.js';
import { isDbHealthy } from './db/index.js';
import { logger } from './lib/logger.js';
import { identifyCaller } from './middleware/authenticate.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { setupRateLimit } from './middleware/rate-limit.js';
import { REQUEST_ID_HEADER, setupRequestContext } from './middleware/request-context.js';
import { authRoutes } from './modules/auth/auth.routes.js';
import { favoriteRoutes } from './modules/favorites/favorite.routes.js';
import { movieRoutes } from './modules/movies/movie.routes.js';
import { recommendationRoutes } from './modules/recommendations/recommendation.routes.js';
import { createServices, type ServiceOverrides, type Services } from './services.js';

export const API_PREFIX = '/api/v1';

export interface BuildAppOptions extends ServiceOverrides {
  https?: ServerOptions;
  services?: Services;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const services = options.services ?? createServices(options);

  const app = Fastify({
    logger: false,
    ignoreTrailingSlash: true,
    requestIdHeader: REQUEST_ID_HEADER,
    genReqId: () => randomUUID(),
    ...(options.https && { https: options.https }),
  });

  setupRequestContext(app);
  app.addHook('onRequest', identifyCaller);

  app.addHook('onRequest', async (request) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
        requestId: request.id,
      },
      'Incoming request'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
        requestId: request.id,
        userId: request.ctx?.user?.id,
      },
      'Request completed'
    );
  });

  await app.register(cors, {
    origin: config.CORS_ORIGIN.split(',').map((o) => o.trim()),
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    exposedHeaders: [REQUEST_ID_HEADER, 'x-ratelimit-limit', 'x-ratelimit-remaining', 'x-ratelimit-reset', 'retry-after'],
  });

  await setupRateLimit(app);

  app.setErrorHandler(errorHandler);
  app.setNotFoundHandler(notFoundHandler);

  const health = async () => {
    const database = isDbHealthy();
    return {
      status: database ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      database: database ? 'up' : 'down',
      cache: services.cache.getStats(),
    };
  };

  app.get('/health', health);

  await app.register(
    async (api) => {
      api.get('/health', health);
      await api.register(authRoutes);
      await api.register(movieRoutes, { services });
      await api.register(favoriteRoutes, { services });
      await api.register(recommendationRoutes, { services });
    },
    { prefix: API_PREFIX }
  );

  return app;
}
