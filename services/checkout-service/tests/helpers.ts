import { getConfig } from '@storefront/config';
import { InMemoryEventBus } from '@storefront/event-bus';
import type { CatalogProduct, ChargeRequest, PaymentOutcome } from '@storefront/types';

import { buildContainer, type Container } from '../src/container.js';
import type { PaymentGateway } from '../src/payments/payment-gateway.js';
import { PaymentSimulator } from '../src/payments/payment-simulator.js';
import { InMemoryCartRepository } from '../src/repositories/memory/cart.repository.js';
import { InMemoryCatalogRepository } from '../src/repositories/memory/catalog.repository.js';
import { InMemoryCheckoutAttemptRepository } from '../src/repositories/memory/checkout-attempt.repository.js';
import { InMemoryInventoryRepository } from '../src/repositories/memory/inventory.repository.js';
import { InMemoryOrderRepository } from '../src/repositories/memory/order.repository.js';
import type { Repositories } from '../src/repositories/types.js';

export const START = new Date('2026-03-01T10:00:00.000Z');

export const PRODUCT_A: CatalogProduct = {
  productId: 'prod-a',
  sku: 'SKU-A',
  name: 'Product A',
  price: 1000,
  active: true,
};

export const PRODUCT_B: CatalogProduct = {
  productId: 'prod-b',
  sku: 'SKU-B',
  name: 'Product B',
  price: 500,
  active: true,
};

export const RETIRED_PRODUCT: CatalogProduct = {
  productId: 'prod-retired',
  sku: 'SKU-R',
  name: 'Retired Product',
  price: 300,
  active: false,
};

export const APPROVE = { token: 'tok_approve' };
export const DECLINE = { token: 'tok_decline' };
export const PROVIDER_ERROR = { token: 'tok_error' };

export function secondsAfter(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/** Gateway whose charges stay pending until the test answers them. */
export class DeferredGateway implements PaymentGateway {
  readonly provider = 'deferred';
  readonly requests: ChargeRequest[] = [];
  private readonly waiting: Array<(outcome: PaymentOutcome) => void> = [];

  charge(request: ChargeRequest): Promise<PaymentOutcome> {
    this.requests.push(request);
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  answer(outcome: PaymentOutcome): void {
    const resolve = this.waiting.shift();
    if (!resolve) {
      throw new Error('No charge is waiting for an answer');
    }
    resolve(outcome);
  }
}

export interface TestContextOptions {
  stock?: Record<string, number>;
  payments?: PaymentGateway;
}

export interface TestContext {
  container: Container;
  repositories: Repositories;
  catalog: InMemoryCatalogRepository;
  events: InMemoryEventBus;
}

export async function createTestContext(options: TestContextOptions = {}): Promise<TestContext> {
  const catalog = new InMemoryCatalogRepository([PRODUCT_A, PRODUCT_B, RETIRED_PRODUCT]);
  const inventory = new InMemoryInventoryRepository();

  const stock = { 'prod-a': 10, 'prod-b': 10, ...options.stock };
  for (const [productId, available] of Object.entries(stock)) {
    await inventory.setAvailable(productId, available);
  }

  const repositories: Repositories = {
    inventory,
    catalog,
    carts: new InMemoryCartRepository(),
    attempts: new InMemoryCheckoutAttemptRepository(),
    orders: new InMemoryOrderRepository(),
  };
  const events = new InMemoryEventBus();
  const container = buildContainer({
    config: getConfig(),
    repositories,
    events,
    payments: options.payments ?? new PaymentSimulator(),
  });

  return { container, repositories, catalog, events };
}
