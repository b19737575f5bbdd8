import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import fastify, { type FastifyInstance } from 'fastify';

import { registerRequestLogging } from '@storefront/logger';
import type { ApiResponse, HealthCheck } from '@storefront/types';

import type { Container } from './container.js';
import { StorefrontError } from './errors.js';
import { setupRoutes } from './routes/index.js';

export async function createApp(container: Container): Promise<FastifyInstance> {
  const { config } = container;

  const app = fastify({
    logger: false,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
  });

  // Security middleware
  await app.register(helmet);
  await app.register(cors, {
    origin: config.CORS_ORIGIN,
    credentials: true,
  });

  await app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: '1 minute',
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      success: false,
      error: 'Too many requests, please try again later',
      code: 'RATE_LIMITED',
      message: `Rate limit exceeded, retry in ${context.after}`,
      timestamp: new Date().toISOString(),
    }),
  });

  registerRequestLogging(app);

  // Global error handler
  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof StorefrontError) {
      if (error.statusCode >= 500) {
        request.log.error({ error }, 'Request failed');
      } else {
        request.log.warn({ code: error.code, details: error.details }, error.message);
      }

      const body: ApiResponse = {
        success: false,
        error: error.statusCode >= 500 ? 'Internal server error' : error.message,
        code: error.code,
        ...(error.statusCode < 500 && error.details && { details: error.details }),
        timestamp: new Date().toISOString(),
        requestId: request.id,
      };
      reply.code(error.statusCode).send(body);
      return;
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ error }, 'Request error');
    }

    const body: ApiResponse = {
      success: false,
      error: statusCode >= 500 ? 'Internal server error' : error.message,
      ...(error.code && { code: error.code }),
      timestamp: new Date().toISOString(),
      requestId: request.id,
    };
    reply.code(statusCode).send(body);
  });

  app.setNotFoundHandler(async (request, reply) => {
    reply.code(404).send({
      success: false,
      error: `Route ${request.method} ${request.url} not found`,
      code: 'NOT_FOUND',
      timestamp: new Date().toISOString(),
      requestId: request.id,
    });
  });

  await setupRoutes(app, container);

  // Health check
  app.get('/health', async (): Promise<HealthCheck> => ({
    status: 'healthy',
    service: config.OTEL_SERVICE_NAME,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  }));

  return app;
}
