import { createChildLogger } from '@storefront/logger';
import type { Order } from '@storefront/types';

import { DuplicateOrderError } from '../errors.js';
import type { OrderPage, OrderRepository } from '../repositories/types.js';

const log = createChildLogger({ component: 'order-ledger' });

/**
 * Human-facing order number, `ORD-YYYYMMDD-XXXXXXXX`. The suffix comes from
 * the order id so a replayed commit produces the same number.
 */
export function generateOrderNumber(orderId: string, date: Date): string {
  const day = date.toISOString().slice(0, 10).replaceAll('-', '');
  const suffix = orderId.replaceAll('-', '').slice(0, 8).toUpperCase();
  return `ORD-${day}-${suffix}`;
}

/** Append-only store of immutable orders. */
export class OrderLedger {
  constructor(private readonly repository: OrderRepository) {}

  async append(order: Order): Promise<Order> {
    const inserted = await this.repository.insert(order);
    if (!inserted) {
      throw new DuplicateOrderError(order.orderId, order.idempotencyKey);
    }
    log.info(
      { orderId: order.orderId, orderNumber: order.orderNumber, ownerId: order.ownerId, total: order.total },
      'Order recorded'
    );
    return order;
  }

  async get(orderId: string): Promise<Order | null> {
    return this.repository.findById(orderId);
  }

  async findByIdempotencyKey(idempotencyKey: string): Promise<Order | null> {
    return this.repository.findByIdempotencyKey(idempotencyKey);
  }

  async listForOwner(ownerId: string, page: OrderPage): Promise<Order[]> {
    return this.repository.findByOwner(ownerId, page);
  }

  async countForOwner(ownerId: string): Promise<number> {
    return this.repository.countByOwner(ownerId);
  }
}
