import { readFileSync } from 'fs';

import { z } from 'zod';

import type { Config } from '@storefront/config';
import type { EventPublisher } from '@storefront/event-bus';

import { createPaymentGateway, type PaymentGateway } from './payments/payment-gateway.js';
import { MongoCartRepository } from './repositories/cart.repository.js';
import { MongoCatalogRepository } from './repositories/catalog.repository.js';
import { MongoCheckoutAttemptRepository } from './repositories/checkout-attempt.repository.js';
import { MongoInventoryRepository } from './repositories/inventory.repository.js';
import { InMemoryCartRepository } from './repositories/memory/cart.repository.js';
import { InMemoryCatalogRepository } from './repositories/memory/catalog.repository.js';
import { InMemoryCheckoutAttemptRepository } from './repositories/memory/checkout-attempt.repository.js';
import { InMemoryInventoryRepository } from './repositories/memory/inventory.repository.js';
import { InMemoryOrderRepository } from './repositories/memory/order.repository.js';
import { MongoOrderRepository } from './repositories/order.repository.js';
import type { CheckoutAttemptRepository, Repositories } from './repositories/types.js';
import { CartService } from './services/cart.service.js';
import { CatalogService } from './services/catalog.service.js';
import { CheckoutCoordinator, hasApprovedPayment } from './services/checkout.service.js';
import { InventoryLedger, type ReservationGuard } from './services/inventory-ledger.service.js';
import { OrderLedger } from './services/order-ledger.service.js';
import { RecoveryService } from './services/recovery.service.js';

export interface Container {
  config: Config;
  repositories: Repositories;
  events: EventPublisher;
  payments: PaymentGateway;
  catalog: CatalogService;
  inventory: InventoryLedger;
  carts: CartService;
  orders: OrderLedger;
  checkout: CheckoutCoordinator;
  recovery: RecoveryService;
}

export interface ContainerOptions {
  config: Config;
  repositories: Repositories;
  events: EventPublisher;
  payments?: PaymentGateway;
}

/** Reservations of a checkout that is being charged or has been paid stay held past their expiry. */
export function paidCheckoutGuard(attempts: CheckoutAttemptRepository): ReservationGuard {
  return async (reservation) => {
    const attempt = await attempts.findById(reservation.checkoutId);
    return attempt !== null && (hasApprovedPayment(attempt) || attempt.state === 'payment_pending');
  };
}

export function buildContainer({ config, repositories, events, payments }: ContainerOptions): Container {
  const gateway = payments ?? createPaymentGateway(config);
  const catalog = new CatalogService(repositories.catalog);
  const inventory = new InventoryLedger(repositories.inventory, events, {
    holdSeconds: config.CHECKOUT_TIMEOUT_SECONDS,
    guard: paidCheckoutGuard(repositories.attempts),
  });
  const carts = new CartService(repositories.carts, catalog, {
    maxLineQuantity: config.MAX_LINE_QUANTITY,
  });
  const orders = new OrderLedger(repositories.orders);
  const checkout = new CheckoutCoordinator(
    {
      attempts: repositories.attempts,
      carts,
      catalog,
      inventory,
      orders,
      payments: gateway,
      events,
    },
    {
      timeoutSeconds: config.CHECKOUT_TIMEOUT_SECONDS,
      maxLineQuantity: config.MAX_LINE_QUANTITY,
    }
  );
  const recovery = new RecoveryService(repositories.attempts, checkout, inventory, {
    intervalSeconds: config.RECOVERY_INTERVAL_SECONDS,
  });

  return { config, repositories, events, payments: gateway, catalog, inventory, carts, orders, checkout, recovery };
}

const seedProductSchema = z.object({
  productId: z.string().min(1),
  sku: z.string().min(1),
  name: z.string().min(1),
  // Prices are in minor units; a zero total could never be charged
  price: z.number().int().min(1),
  active: z.boolean(),
  stock: z.number().int().min(0),
});

export type SeedProduct = z.infer<typeof seedProductSchema>;

export function parseSeedCatalog(raw: unknown): SeedProduct[] {
  return z.array(seedProductSchema).parse(raw);
}

export function loadSeedCatalog(): SeedProduct[] {
  return parseSeedCatalog(JSON.parse(readFileSync(new URL('../data/seed-catalog.json', import.meta.url), 'utf8')));
}

export async function createMemoryRepositories(seed: SeedProduct[] = []): Promise<Repositories> {
  const inventory = new InMemoryInventoryRepository();
  const catalog = new InMemoryCatalogRepository();

  for (const { stock, ...product } of seed) {
    catalog.upsert(product);
    await inventory.setAvailable(product.productId, stock);
  }

  return {
    inventory,
    catalog,
    carts: new InMemoryCartRepository(),
    attempts: new InMemoryCheckoutAttemptRepository(),
    orders: new InMemoryOrderRepository(),
  };
}

export function createMongoRepositories(): Repositories {
  return {
    inventory: new MongoInventoryRepository(),
    catalog: new MongoCatalogRepository(),
    carts: new MongoCartRepository(),
    attempts: new MongoCheckoutAttemptRepository(),
    orders: new MongoOrderRepository(),
  };
}
