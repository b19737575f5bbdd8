import type { Order } from '@storefront/types';

import type { OrderPage, OrderRepository } from '../types.js';

export class InMemoryOrderRepository implements OrderRepository {
  private readonly orders: Order[] = [];

  async insert(order: Order): Promise<boolean> {
    const duplicate = this.orders.some(
      (existing) =>
        existing.orderId === order.orderId ||
        existing.orderNumber === order.orderNumber ||
        existing.idempotencyKey === order.idempotencyKey
    );
    if (duplicate) {
      return false;
    }
    this.orders.push(structuredClone(order));
    return true;
  }

  async findById(orderId: string): Promise<Order | null> {
    return this.find((order) => order.orderId === orderId);
  }

  async findByIdempotencyKey(idempotencyKey: string): Promise<Order | null> {
    return this.find((order) => order.idempotencyKey === idempotencyKey);
  }

  async findByOwner(ownerId: string, page: OrderPage): Promise<Order[]> {
    return this.orders
      .map((order, index) => ({ order, index }))
      .filter(({ order }) => order.ownerId === ownerId)
      .sort((a, b) => b.order.createdAt.getTime() - a.order.createdAt.getTime() || b.index - a.index)
      .slice(page.skip, page.skip + page.limit)
      .map(({ order }) => structuredClone(order));
  }

  async countByOwner(ownerId: string): Promise<number> {
    return this.orders.filter((order) => order.ownerId === ownerId).length;
  }

  private find(predicate: (order: Order) => boolean): Order | null {
    const order = this.orders.find(predicate);
    return order ? structuredClone(order) : null;
  }
}
