import { randomUUID } from 'crypto';

import { getConfig, isDevelopment } from '@storefront/config';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import pino from 'pino';

const config = getConfig();

export const logger = pino({
  level: config.LOG_LEVEL,
  ...(isDevelopment() && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'hostname,pid',
      },
    },
  }),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
});

export type Logger = typeof logger;

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

const requestStartTimes = new WeakMap<FastifyRequest, number>();

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function requestLogger() {
  return async function (request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const requestId = headerValue(request.headers['x-request-id']) ?? randomUUID();

    // Echo the id so callers and downstream services can correlate logs
    reply.header('x-request-id', requestId);

    request.log = logger.child({ requestId, service: config.OTEL_SERVICE_NAME });
    requestStartTimes.set(request, Date.now());
  };
}

export function responseLogger() {
  return async function (request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const startedAt = requestStartTimes.get(request);
    request.log.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        userAgent: request.headers['user-agent'],
        duration: startedAt === undefined ? undefined : Date.now() - startedAt,
      },
      'Request completed'
    );
  };
}

export function registerRequestLogging(app: FastifyInstance): void {
  app.addHook('onRequest', requestLogger());
  app.addHook('onResponse', responseLogger());
}
