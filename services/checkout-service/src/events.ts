import type { EventPublisher } from '@storefront/event-bus';
import { logger } from '@storefront/logger';

export const EventTypes = {
  ORDER_CREATED: 'order.created',
  CHECKOUT_REJECTED: 'checkout.rejected',
  INVENTORY_RESERVED: 'inventory.reserved',
  INVENTORY_RELEASED: 'inventory.released',
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

/**
 * Events are published after the state change they describe is durable. A
 * failed publish is logged and does not undo the change.
 */
export async function publishEvent<T>(
  events: EventPublisher,
  type: EventType,
  payload: T,
  eventId?: string
): Promise<void> {
  try {
    await events.publish(type, payload, eventId);
  } catch (error) {
    logger.error({ error, type, eventId }, 'Failed to publish event');
  }
}
