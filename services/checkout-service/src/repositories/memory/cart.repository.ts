import type { Cart } from '@storefront/types';

import type { CartChanges, CartRepository } from '../types.js';

function copyCart(cart: Cart): Cart {
  return {
    ...cart,
    items: cart.items.map((item) => ({ ...item })),
    settledCheckoutIds: [...cart.settledCheckoutIds],
  };
}

export class InMemoryCartRepository implements CartRepository {
  private readonly carts = new Map<string, Cart>();

  async findByOwner(ownerId: string): Promise<Cart | null> {
    const cart = this.carts.get(ownerId);
    return cart ? copyCart(cart) : null;
  }

  async compareAndSet(
    ownerId: string,
    expectedVersion: number,
    changes: CartChanges
  ): Promise<Cart | null> {
    const current = this.carts.get(ownerId);
    if ((current?.version ?? 0) !== expectedVersion) {
      return null;
    }

    const next: Cart = {
      ownerId,
      items: changes.items.map((item) => ({ ...item })),
      version: expectedVersion + 1,
      settledCheckoutIds: [...(changes.settledCheckoutIds ?? current?.settledCheckoutIds ?? [])],
      updatedAt: new Date(),
    };
    this.carts.set(ownerId, next);
    return copyCart(next);
  }
}
