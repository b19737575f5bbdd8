import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Span,
  type Tracer,
} from '@opentelemetry/api';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';

import { getConfig } from '@storefront/config';
import { logger } from '@storefront/logger';

const config = getConfig();

const TRACER_VERSION = '1.0.0';

let sdk: NodeSDK | null = null;
let tracer: Tracer | null = null;

export function initializeObservability(serviceName: string): void {
  try {
    const resource = new Resource({
      [SemanticResourceAttributes.SERVICE_NAME]: serviceName,
      [SemanticResourceAttributes.SERVICE_VERSION]: TRACER_VERSION,
      [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: config.NODE_ENV,
      [SemanticResourceAttributes.SERVICE_NAMESPACE]: config.OTEL_SERVICE_NAME,
    });

    const traceExporter = config.OTEL_EXPORTER_OTLP_ENDPOINT
      ? new OTLPTraceExporter({
          url: `${config.OTEL_EXPORTER_OTLP_ENDPOINT}/v1/traces`,
        })
      : undefined;

    sdk = new NodeSDK({
      resource,
      traceExporter,
      instrumentations: [
        getNodeAutoInstrumentations({
          '@opentelemetry/instrumentation-fs': { enabled: false },
          '@opentelemetry/instrumentation-net': { enabled: false },
          '@opentelemetry/instrumentation-dns': { enabled: false },
        }),
      ],
    });

    sdk.start();

    tracer = trace.getTracer(serviceName, TRACER_VERSION);

    logger.info({ serviceName }, 'OpenTelemetry initialized');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize OpenTelemetry');
  }
}

export async function shutdownObservability(): Promise<void> {
  if (!sdk) {
    return;
  }
  try {
    await sdk.shutdown();
  } catch (error) {
    logger.warn({ error }, 'OpenTelemetry shutdown failed');
  } finally {
    sdk = null;
    tracer = null;
  }
}

/**
 * Returns the service tracer. Before {@link initializeObservability} runs this
 * is the API's global tracer, which records nothing until an SDK registers.
 */
export function getTracer(): Tracer {
  return tracer ?? trace.getTracer(config.OTEL_SERVICE_NAME, TRACER_VERSION);
}

function createSpan(name: string, options?: { kind?: SpanKind }): Span {
  return getTracer().startSpan(name, {
    kind: options?.kind ?? SpanKind.INTERNAL,
  });
}

export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options?: { kind?: SpanKind }
): Promise<T> {
  const span = createSpan(name, options);

  try {
    const result = await context.with(trace.setSpan(context.active(), span), () => fn(span));
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : 'Unknown error',
    });
    if (error instanceof Error) {
      span.recordException(error);
    }
    throw error;
  } finally {
    span.end();
  }
}

export function addSpanAttributes(attributes: Record<string, string | number | boolean>): void {
  trace.getActiveSpan()?.setAttributes(attributes);
}

// Database operation tracing
export async function traceDbOperation<T>(
  operation: string,
  collection: string,
  fn: () => Promise<T>
): Promise<T> {
  return withSpan(
    `db.${collection}.${operation}`,
    async (span) => {
      span.setAttributes({
        'db.system': 'mongodb',
        'db.collection.name': collection,
        'db.operation': operation,
      });
      return fn();
    },
    { kind: SpanKind.CLIENT }
  );
}

// Outbound provider calls (payment gateways)
export async function traceProviderCall<T>(
  provider: string,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  return withSpan(
    `provider.${provider}.${operation}`,
    async (span) => {
      span.setAttributes({
        'provider.name': provider,
        'provider.operation': operation,
      });
      return fn();
    },
    { kind: SpanKind.CLIENT }
  );
}

// Message queue tracing
export async function traceEventPublish<T>(
  exchange: string,
  routingKey: string,
  fn: () => Promise<T>
): Promise<T> {
  return withSpan(
    `message.publish`,
    async (span) => {
      span.setAttributes({
        'messaging.system': 'rabbitmq',
        'messaging.destination': exchange,
        'messaging.routing_key': routingKey,
        'messaging.operation': 'publish',
      });
      return fn();
    },
    { kind: SpanKind.PRODUCER }
  );
}

// Business logic tracing
export async function traceBusiness<T>(
  operationName: string,
  entityType: string,
  entityId: string,
  fn: () => Promise<T>
): Promise<T> {
  return withSpan(`business.${entityType}.${operationName}`, async (span) => {
    span.setAttributes({
      'business.operation': operationName,
      'business.entity.type': entityType,
      'business.entity.id': entityId,
    });
    return fn();
  });
}
