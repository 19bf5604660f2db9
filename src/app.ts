import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { AppError } from './common/errors.js';
import { createLootpoolModule, lootpoolRoutes, type LootpoolModule } from './modules/lootpool/index.js';

export interface BuildAppOptions {
  lootpool?: LootpoolModule;
  logLevel?: string;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: {
      level: options.logLevel ?? env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      app.log.warn({ code: err.code }, err.message);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    timestamp: new Date().toISOString(),
  }));

  const lootpool = options.lootpool ?? createLootpoolModule({
    poolApiBaseUrl: env.POOL_API_BASE_URL,
    categoryApiBaseUrl: env.CATEGORY_API_BASE_URL,
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
    poolCacheTtlMs: env.POOL_CACHE_TTL_MS,
    categoryCacheTtlMs: env.CATEGORY_CACHE_TTL_MS,
  });
  app.register(lootpoolRoutes, { prefix: '/api/lootpool', lootpool });

  return app;
}
