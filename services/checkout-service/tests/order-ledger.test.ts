import { describe, expect, it } from 'vitest';

import type { Order } from '@storefront/types';

import { DuplicateOrderError } from '../src/errors.js';
import { InMemoryOrderRepository } from '../src/repositories/memory/order.repository.js';
import { OrderLedger, generateOrderNumber } from '../src/services/order-ledger.service.js';

function order(overrides: Partial<Order> & Pick<Order, 'orderId'>): Order {
  return {
    orderNumber: generateOrderNumber(overrides.orderId, new Date('2026-03-01T10:00:00.000Z')),
    checkoutId: `chk-${overrides.orderId}`,
    idempotencyKey: `key-${overrides.orderId}`,
    ownerId: 'user:buyer-1',
    items: [{ productId: 'prod-a', sku: 'SKU-A', name: 'Product A', quantity: 1, unitPrice: 1000, lineTotal: 1000 }],
    total: 1000,
    payment: { status: 'approved', provider: 'simulator', transactionId: 'sim_test', amount: 1000 },
    createdAt: new Date('2026-03-01T10:00:00.000Z'),
    ...overrides,
  };
}

describe('generateOrderNumber', () => {
  it('formats the UTC date and the start of the order id', () => {
    expect(
      generateOrderNumber('3f2a9c1e-5b7d-4e8f-9a0b-1c2d3e4f5a6b', new Date('2026-03-01T23:30:00.000Z'))
    ).toBe('ORD-20260301-3F2A9C1E');
  });
});

describe('OrderLedger', () => {
  it('appends and reads back an order', async () => {
    const ledger = new OrderLedger(new InMemoryOrderRepository());
    const placed = order({ orderId: 'aaaaaaaa-0000-4000-8000-000000000001' });

    await ledger.append(placed);

    expect(await ledger.get(placed.orderId)).toEqual(placed);
    expect(await ledger.findByIdempotencyKey(placed.idempotencyKey)).toEqual(placed);
    expect(await ledger.get('bbbbbbbb-0000-4000-8000-000000000001')).toBeNull();
  });

  it('refuses a second order with the same id or idempotency key', async () => {
    const ledger = new OrderLedger(new InMemoryOrderRepository());
    const placed = order({ orderId: 'aaaaaaaa-0000-4000-8000-000000000001' });
    await ledger.append(placed);

    await expect(ledger.append(placed)).rejects.toBeInstanceOf(DuplicateOrderError);
    await expect(
      ledger.append(
        order({
          orderId: 'bbbbbbbb-0000-4000-8000-000000000002',
          idempotencyKey: placed.idempotencyKey,
        })
      )
    ).rejects.toMatchObject({ code: 'DUPLICATE_ORDER', statusCode: 500 });
    expect(await ledger.countForOwner('user:buyer-1')).toBe(1);
  });

  it('lists an owner’s orders newest first', async () => {
    const ledger = new OrderLedger(new InMemoryOrderRepository());
    await ledger.append(
      order({ orderId: 'aaaaaaaa-0000-4000-8000-000000000001', createdAt: new Date('2026-03-01T10:00:00.000Z') })
    );
    await ledger.append(
      order({ orderId: 'bbbbbbbb-0000-4000-8000-000000000002', createdAt: new Date('2026-03-02T10:00:00.000Z') })
    );
    await ledger.append(
      order({ orderId: 'cccccccc-0000-4000-8000-000000000003', createdAt: new Date('2026-03-03T10:00:00.000Z') })
    );
    await ledger.append(order({ orderId: 'dddddddd-0000-4000-8000-000000000004', ownerId: 'user:someone-else' }));

    const firstPage = await ledger.listForOwner('user:buyer-1', { limit: 2, skip: 0 });
    const secondPage = await ledger.listForOwner('user:buyer-1', { limit: 2, skip: 2 });

    expect(firstPage.map((placed) => placed.orderId)).toEqual([
      'cccccccc-0000-4000-8000-000000000003',
      'bbbbbbbb-0000-4000-8000-000000000002',
    ]);
    expect(secondPage.map((placed) => placed.orderId)).toEqual(['aaaaaaaa-0000-4000-8000-000000000001']);
    expect(await ledger.countForOwner('user:buyer-1')).toBe(3);
  });
});
