import { createChildLogger } from '@storefront/logger';
import type { Cart, CartItem, CartSnapshot, CartView } from '@storefront/types';

import {
  ConcurrentModificationError,
  InvalidQuantityError,
  NotFoundError,
  ProductUnavailableError,
} from '../errors.js';
import type { CartChanges, CartRepository } from '../repositories/types.js';
import type { CatalogService } from './catalog.service.js';

const log = createChildLogger({ component: 'cart-store' });

/** How many settled checkout ids a cart remembers. */
const SETTLED_HISTORY = 20;
const SETTLE_ATTEMPTS = 5;

export interface CartWriteOptions {
  /** Defaults to the version read at the start of the write. */
  expectedVersion?: number;
}

export interface AddItemOptions extends CartWriteOptions {
  /** Set the line quantity instead of adding to it. */
  replace?: boolean;
}

export interface CartServiceOptions {
  maxLineQuantity: number;
}

export type PurchasedLine = Pick<CartItem, 'productId' | 'quantity'>;

function emptyCart(ownerId: string): Cart {
  return { ownerId, items: [], version: 0, settledCheckoutIds: [], updatedAt: new Date(0) };
}

export function toCartView(cart: Cart): CartView {
  return {
    ownerId: cart.ownerId,
    version: cart.version,
    items: cart.items,
    totalItems: cart.items.reduce((sum, item) => sum + item.quantity, 0),
    subtotal: cart.items.reduce((sum, item) => sum + item.quantity * item.unitPrice, 0),
    updatedAt: cart.updatedAt,
  };
}

export class CartService {
  constructor(
    private readonly repository: CartRepository,
    private readonly catalog: CatalogService,
    private readonly options: CartServiceOptions
  ) {}

  async getCart(ownerId: string): Promise<CartView> {
    return toCartView(await this.load(ownerId));
  }

  async addItem(
    ownerId: string,
    productId: string,
    quantity: number,
    options: AddItemOptions = {}
  ): Promise<CartView> {
    this.assertQuantity(productId, quantity);

    const product = await this.catalog.getProduct(productId);
    if (!product || !product.active) {
      throw new ProductUnavailableError(productId);
    }

    return this.mutate(ownerId, options.expectedVersion, (cart) => {
      const existing = cart.items.find((item) => item.productId === productId);
      const nextQuantity = existing && !options.replace ? existing.quantity + quantity : quantity;
      this.assertQuantity(productId, nextQuantity);

      const line: CartItem = {
        productId,
        name: product.name,
        quantity: nextQuantity,
        unitPrice: product.price,
        addedAt: existing?.addedAt ?? new Date(),
      };

      return {
        items: existing
          ? cart.items.map((item) => (item.productId === productId ? line : item))
          : [...cart.items, line],
      };
    });
  }

  /** A quantity of 0 removes the line. */
  async updateQuantity(
    ownerId: string,
    productId: string,
    quantity: number,
    options: CartWriteOptions = {}
  ): Promise<CartView> {
    if (quantity === 0) {
      return this.removeItem(ownerId, productId, options);
    }
    this.assertQuantity(productId, quantity);

    return this.mutate(ownerId, options.expectedVersion, (cart) => {
      if (!cart.items.some((item) => item.productId === productId)) {
        throw new NotFoundError('Cart item', productId);
      }
      return {
        items: cart.items.map((item) => (item.productId === productId ? { ...item, quantity } : item)),
      };
    });
  }

  async removeItem(ownerId: string, productId: string, options: CartWriteOptions = {}): Promise<CartView> {
    return this.mutate(ownerId, options.expectedVersion, (cart) => {
      if (!cart.items.some((item) => item.productId === productId)) {
        throw new NotFoundError('Cart item', productId);
      }
      return { items: cart.items.filter((item) => item.productId !== productId) };
    });
  }

  async clear(ownerId: string, expectedVersion?: number): Promise<CartView> {
    return this.mutate(ownerId, expectedVersion, () => ({ items: [] }));
  }

  /** Frozen copy of the cart as it is right now. */
  async snapshot(ownerId: string): Promise<CartSnapshot> {
    const cart = await this.load(ownerId);
    return Object.freeze({
      ownerId: cart.ownerId,
      version: cart.version,
      items: Object.freeze(cart.items.map((item) => Object.freeze({ ...item }))),
      capturedAt: new Date(),
    });
  }

  /**
   * Removes a completed purchase from the cart. An unchanged cart is cleared;
   * a cart edited after the snapshot keeps whatever was not bought. Settling
   * the same checkout twice changes nothing.
   */
  async settle(
    ownerId: string,
    checkoutId: string,
    snapshotVersion: number,
    purchased: readonly PurchasedLine[]
  ): Promise<void> {
    for (let attempt = 0; attempt < SETTLE_ATTEMPTS; attempt += 1) {
      const cart = await this.repository.findByOwner(ownerId);
      if (!cart || cart.settledCheckoutIds.includes(checkoutId)) {
        return;
      }

      const items = cart.version === snapshotVersion ? [] : subtractLines(cart.items, purchased);
      const settledCheckoutIds = [...cart.settledCheckoutIds, checkoutId].slice(-SETTLED_HISTORY);

      if (await this.repository.compareAndSet(ownerId, cart.version, { items, settledCheckoutIds })) {
        log.debug({ ownerId, checkoutId, cleared: items.length === 0 }, 'Cart settled');
        return;
      }
    }

    const current = await this.load(ownerId);
    throw new ConcurrentModificationError(ownerId, snapshotVersion, current.version);
  }

  /** Folds an anonymous session cart into a signed-in user's cart and empties the session cart. */
  async merge(userOwnerId: string, sessionOwnerId: string): Promise<CartView> {
    const source = await this.load(sessionOwnerId);
    if (source.items.length === 0) {
      return this.getCart(userOwnerId);
    }

    const merged = await this.mutate(userOwnerId, undefined, (cart) => {
      const items = cart.items.map((item) => ({ ...item }));
      for (const incoming of source.items) {
        const existing = items.find((item) => item.productId === incoming.productId);
        if (existing) {
          existing.quantity = Math.min(existing.quantity + incoming.quantity, this.options.maxLineQuantity);
        } else {
          items.push({ ...incoming, quantity: Math.min(incoming.quantity, this.options.maxLineQuantity) });
        }
      }
      return { items };
    });

    await this.clear(sessionOwnerId, source.version);
    log.info({ userOwnerId, sessionOwnerId, lines: source.items.length }, 'Session cart merged');
    return merged;
  }

  private async load(ownerId: string): Promise<Cart> {
    return (await this.repository.findByOwner(ownerId)) ?? emptyCart(ownerId);
  }

  private async mutate(
    ownerId: string,
    expectedVersion: number | undefined,
    change: (cart: Cart) => CartChanges
  ): Promise<CartView> {
    const cart = await this.load(ownerId);
    if (expectedVersion !== undefined && expectedVersion !== cart.version) {
      throw new ConcurrentModificationError(ownerId, expectedVersion, cart.version);
    }

    const updated = await this.repository.compareAndSet(ownerId, cart.version, change(cart));
    if (!updated) {
      const current = await this.load(ownerId);
      throw new ConcurrentModificationError(ownerId, cart.version, current.version);
    }
    return toCartView(updated);
  }

  private assertQuantity(productId: string, quantity: number): void {
    if (!Number.isInteger(quantity) || quantity < 1 || quantity > this.options.maxLineQuantity) {
      throw new InvalidQuantityError(productId, quantity, this.options.maxLineQuantity);
    }
  }
}

function subtractLines(items: CartItem[], purchased: readonly PurchasedLine[]): CartItem[] {
  const bought = new Map(purchased.map((line) => [line.productId, line.quantity]));
  return items
    .map((item) => ({ ...item, quantity: item.quantity - (bought.get(item.productId) ?? 0) }))
    .filter((item) => item.quantity > 0);
}
