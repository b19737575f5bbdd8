import type { HydratedDocument } from 'mongoose';

import { BaseRepository, isDuplicateKeyError } from '@storefront/db';
import type { Order } from '@storefront/types';

import { OrderModel, type OrderRecord } from '../models/order.model.js';
import type { OrderPage, OrderRepository } from './types.js';

function toOrder(doc: HydratedDocument<OrderRecord>): Order {
  return {
    orderId: doc.orderId,
    orderNumber: doc.orderNumber,
    checkoutId: doc.checkoutId,
    idempotencyKey: doc.idempotencyKey,
    ownerId: doc.ownerId,
    items: doc.items.map((item) => ({
      productId: item.productId,
      sku: item.sku,
      name: item.name,
      quantity: item.quantity,
      unitPrice: item.unitPrice,
      lineTotal: item.lineTotal,
    })),
    total: doc.total,
    payment: {
      status: doc.payment.status,
      provider: doc.payment.provider,
      transactionId: doc.payment.transactionId,
      amount: doc.payment.amount,
    },
    createdAt: doc.createdAt,
  };
}

export class MongoOrderRepository extends BaseRepository<OrderRecord> implements OrderRepository {
  constructor() {
    super(OrderModel, 'orders');
  }

  async insert(order: Order): Promise<boolean> {
    return this.trace('insert', async () => {
      try {
        await this.model.create(order);
        return true;
      } catch (error) {
        if (isDuplicateKeyError(error)) {
          return false;
        }
        throw error;
      }
    });
  }

  async findById(orderId: string): Promise<Order | null> {
    return this.trace('findById', async () => {
      const doc = await this.findOneDocument({ orderId });
      return doc ? toOrder(doc) : null;
    });
  }

  async findByIdempotencyKey(idempotencyKey: string): Promise<Order | null> {
    return this.trace('findByIdempotencyKey', async () => {
      const doc = await this.findOneDocument({ idempotencyKey });
      return doc ? toOrder(doc) : null;
    });
  }

  async findByOwner(ownerId: string, page: OrderPage): Promise<Order[]> {
    return this.trace('findByOwner', async () => {
      const docs = await this.model
        .find({ ownerId })
        .sort({ createdAt: -1, orderNumber: -1 })
        .skip(page.skip)
        .limit(page.limit)
        .exec();
      return docs.map(toOrder);
    });
  }

  async countByOwner(ownerId: string): Promise<number> {
    return this.count({ ownerId });
  }
}
