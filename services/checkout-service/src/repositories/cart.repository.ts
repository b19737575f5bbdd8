import type { HydratedDocument } from 'mongoose';

import { BaseRepository, isDuplicateKeyError } from '@storefront/db';
import type { Cart } from '@storefront/types';

import { CartModel, type CartRecord } from '../models/cart.model.js';
import type { CartChanges, CartRepository } from './types.js';

function toCart(doc: HydratedDocument<CartRecord>): Cart {
  return {
    ownerId: doc.ownerId,
    items: doc.items.map((item) => ({
      productId: item.productId,
      name: item.name,
      quantity: item.quantity,
      unitPrice: item.unitPrice,
      addedAt: item.addedAt,
    })),
    version: doc.version,
    settledCheckoutIds: [...doc.settledCheckoutIds],
    updatedAt: doc.updatedAt,
  };
}

export class MongoCartRepository extends BaseRepository<CartRecord> implements CartRepository {
  constructor() {
    super(CartModel, 'carts');
  }

  async findByOwner(ownerId: string): Promise<Cart | null> {
    return this.trace('findByOwner', async () => {
      const doc = await this.findOneDocument({ ownerId });
      return doc ? toCart(doc) : null;
    });
  }

  async compareAndSet(
    ownerId: string,
    expectedVersion: number,
    changes: CartChanges
  ): Promise<Cart | null> {
    return this.trace('compareAndSet', async () => {
      try {
        const doc = await this.model
          .findOneAndUpdate(
            { ownerId, version: expectedVersion },
            {
              $set: {
                items: changes.items,
                ...(changes.settledCheckoutIds && { settledCheckoutIds: changes.settledCheckoutIds }),
              },
              $inc: { version: 1 },
            },
            // The first write of a cart inserts it; a concurrent first write loses on the unique ownerId
            { new: true, upsert: expectedVersion === 0 }
          )
          .exec();
        return doc ? toCart(doc) : null;
      } catch (error) {
        if (isDuplicateKeyError(error)) {
          return null;
        }
        throw error;
      }
    });
  }
}
