import { randomUUID } from 'crypto';

import { connect } from 'amqplib';

import { getConfig } from '@storefront/config';
import { logger } from '@storefront/logger';
import { traceEventPublish } from '@storefront/observability';
import type { DomainEvent } from '@storefront/types';

const config = getConfig();

export interface EventPublisher {
  publish<T>(routingKey: string, payload: T, eventId?: string): Promise<void>;
  disconnect(): Promise<void>;
}

function createEvent<T>(routingKey: string, payload: T, eventId?: string): DomainEvent<T> {
  return {
    id: eventId ?? randomUUID(),
    type: routingKey,
    data: payload,
    timestamp: new Date().toISOString(),
  };
}

type AmqpConnection = Awaited<ReturnType<typeof connect>>;
type AmqpChannel = Awaited<ReturnType<AmqpConnection['createChannel']>>;

export class RabbitEventBus implements EventPublisher {
  private connection: AmqpConnection | null = null;
  private channel: AmqpChannel | null = null;
  private readonly exchange = 'storefront.events';

  constructor(private readonly url: string = config.RABBITMQ_URL) {}

  async connect(): Promise<void> {
    try {
      this.connection = await connect(this.url);
      this.channel = await this.connection.createChannel();

      await this.channel.assertExchange(this.exchange, 'topic', { durable: true });

      this.connection.on('error', (error: unknown) => {
        logger.error({ error }, 'RabbitMQ connection error');
      });

      this.connection.on('close', () => {
        logger.warn('RabbitMQ connection closed');
      });

      logger.info('Connected to RabbitMQ');
    } catch (error) {
      logger.error({ error }, 'Failed to connect to RabbitMQ');
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    try {
      if (this.channel) {
        await this.channel.close();
        this.channel = null;
      }
      if (this.connection) {
        await this.connection.close();
        this.connection = null;
      }
      logger.info('Disconnected from RabbitMQ');
    } catch (error) {
      logger.error({ error }, 'Error disconnecting from RabbitMQ');
    }
  }

  async publish<T>(routingKey: string, payload: T, eventId?: string): Promise<void> {
    const channel = this.channel;
    if (!channel) {
      throw new Error('RabbitMQ channel not initialized');
    }

    const event = createEvent(routingKey, payload, eventId);
    const message = Buffer.from(JSON.stringify(event));

    await traceEventPublish(this.exchange, routingKey, async () => {
      const published = channel.publish(this.exchange, routingKey, message, {
        persistent: true,
        messageId: event.id,
        contentType: 'application/json',
        timestamp: Date.now(),
      });

      if (!published) {
        throw new Error('Failed to publish message to RabbitMQ');
      }
    });

    logger.debug({ eventId: event.id, routingKey, payloadSize: message.length }, 'Event published');
  }
}

/**
 * In-process publisher for single-instance runs and tests. The most recent
 * `capacity` events are kept in publication order.
 */
export class InMemoryEventBus implements EventPublisher {
  readonly published: DomainEvent[] = [];

  constructor(private readonly capacity = 1000) {}

  async publish<T>(routingKey: string, payload: T, eventId?: string): Promise<void> {
    const event = createEvent(routingKey, payload, eventId);
    this.published.push(event);
    if (this.published.length > this.capacity) {
      this.published.splice(0, this.published.length - this.capacity);
    }
    logger.debug({ eventId: event.id, routingKey }, 'Event recorded');
  }

  eventsOfType(routingKey: string): DomainEvent[] {
    return this.published.filter((event) => event.type === routingKey);
  }

  async disconnect(): Promise<void> {
    this.published.length = 0;
  }
}

let eventBusInstance: EventPublisher | null = null;

export async function getEventBus(): Promise<EventPublisher> {
  if (!eventBusInstance) {
    if (config.EVENT_BUS_DRIVER === 'memory') {
      eventBusInstance = new InMemoryEventBus();
    } else {
      const bus = new RabbitEventBus();
      await bus.connect();
      eventBusInstance = bus;
    }
  }
  return eventBusInstance;
}

export async function closeEventBus(): Promise<void> {
  if (eventBusInstance) {
    await eventBusInstance.disconnect();
    eventBusInstance = null;
  }
}
