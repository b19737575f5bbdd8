import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { signAccessToken } from '@storefront/auth';
import type { ApiResponse, CartView, CheckoutResult, Order, PaginatedResponse, ProductStock } from '@storefront/types';

import { createApp } from '../src/app.js';
import { createTestContext, type TestContext } from './helpers.js';

const SESSION = { 'x-session-id': 'session-0001' };
const OTHER_SESSION = { 'x-session-id': 'session-0002' };

function bearer(userId: string, roles: Array<'user' | 'admin'> = ['user']): Record<string, string> {
  return { authorization: `Bearer ${signAccessToken({ userId, email: `${userId}@example.com`, roles })}` };
}

describe('checkout service HTTP API', () => {
  let ctx: TestContext;
  let app: FastifyInstance;

  const addItem = (headers: Record<string, string>, productId: string, quantity: number) =>
    app.inject({ method: 'POST', url: '/api/cart/items', headers, payload: { productId, quantity } });

  const checkout = (headers: Record<string, string>, token: string, idempotencyKey?: string) =>
    app.inject({
      method: 'POST',
      url: '/api/checkout',
      headers,
      payload: { paymentDetails: { token }, ...(idempotencyKey && { idempotencyKey }) },
    });

  beforeEach(async () => {
    ctx = await createTestContext();
    app = await createApp(ctx.container);
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json<{ status: string }>().status).toBe('healthy');
  });

  describe('identity', () => {
    it('requires a token or a session id', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/cart' });

      expect(response.statusCode).toBe(401);
      expect(response.json<ApiResponse>()).toMatchObject({ success: false, code: 'UNAUTHORIZED' });
    });

    it('rejects a malformed session id', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/cart', headers: { 'x-session-id': 'short' } });

      expect(response.statusCode).toBe(401);
      expect(response.json<ApiResponse>().error).toBe('Invalid session id');
    });

    it('rejects an invalid bearer token', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/cart',
        headers: { authorization: 'Bearer not-a-token' },
      });

      expect(response.statusCode).toBe(401);
    });

    it('keys a signed-in user’s cart by user id', async () => {
      await addItem(bearer('user-1'), 'prod-a', 1);

      const response = await app.inject({ method: 'GET', url: '/api/cart', headers: bearer('user-1') });

      expect(response.json<ApiResponse<CartView>>().data?.ownerId).toBe('user:user-1');
    });
  });

  describe('cart', () => {
    it('adds items and reports totals', async () => {
      await addItem(SESSION, 'prod-a', 2);
      const response = await addItem(SESSION, 'prod-b', 1);

      expect(response.statusCode).toBe(200);
      const cart = response.json<ApiResponse<CartView>>().data;
      expect(cart?.ownerId).toBe('session:session-0001');
      expect(cart?.version).toBe(2);
      expect(cart?.totalItems).toBe(3);
      expect(cart?.subtotal).toBe(2500);
    });

    it('validates the request body', async () => {
      const response = await addItem(SESSION, 'prod-a', 0);

      expect(response.statusCode).toBe(400);
      expect(response.json<ApiResponse>()).toMatchObject({
        success: false,
        error: 'Validation failed',
        code: 'VALIDATION_FAILED',
        details: [{ field: 'quantity', message: 'Quantity must be at least 1' }],
      });
    });

    it('answers a stale version with 409', async () => {
      await addItem(SESSION, 'prod-a', 2);

      const response = await app.inject({
        method: 'POST',
        url: '/api/cart/items',
        headers: SESSION,
        payload: { productId: 'prod-b', quantity: 1, version: 0 },
      });

      expect(response.statusCode).toBe(409);
      expect(response.json<ApiResponse>()).toMatchObject({
        code: 'CONCURRENT_MODIFICATION',
        details: { expectedVersion: 0, actualVersion: 1 },
      });
    });

    it('maps catalog problems to 422', async () => {
      const response = await addItem(SESSION, 'prod-retired', 1);

      expect(response.statusCode).toBe(422);
      expect(response.json<ApiResponse>().code).toBe('PRODUCT_UNAVAILABLE');
    });

    it('updates, removes and clears lines', async () => {
      await addItem(SESSION, 'prod-a', 2);
      await addItem(SESSION, 'prod-b', 1);

      const patched = await app.inject({
        method: 'PATCH',
        url: '/api/cart/items/prod-a',
        headers: SESSION,
        payload: { quantity: 4 },
      });
      expect(patched.json<ApiResponse<CartView>>().data?.subtotal).toBe(4500);

      const removed = await app.inject({
        method: 'DELETE',
        url: '/api/cart/items/prod-b?version=3',
        headers: SESSION,
      });
      expect(removed.json<ApiResponse<CartView>>().data?.items.map((item) => item.productId)).toEqual(['prod-a']);

      const cleared = await app.inject({ method: 'POST', url: '/api/cart/clear', headers: SESSION });
      expect(cleared.statusCode).toBe(200);
      expect(cleared.json<ApiResponse<CartView>>().data).toMatchObject({ items: [], version: 5 });
    });

    it('answers a missing line with 404', async () => {
      const response = await app.inject({ method: 'DELETE', url: '/api/cart/items/prod-a', headers: SESSION });

      expect(response.statusCode).toBe(404);
      expect(response.json<ApiResponse>().code).toBe('NOT_FOUND');
    });

    it('merges a session cart into the signed-in user’s cart', async () => {
      await addItem(SESSION, 'prod-a', 1);
      await addItem(bearer('user-1'), 'prod-a', 2);

      const response = await app.inject({
        method: 'POST',
        url: '/api/cart/merge',
        headers: bearer('user-1'),
        payload: { sessionId: 'session-0001' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json<ApiResponse<CartView>>().data?.items[0]?.quantity).toBe(3);
    });

    it('only lets signed-in users merge', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/cart/merge',
        headers: SESSION,
        payload: { sessionId: 'session-0002' },
      });

      expect(response.statusCode).toBe(401);
    });
  });

  describe('checkout', () => {
    beforeEach(async () => {
      await addItem(SESSION, 'prod-a', 2);
      await addItem(SESSION, 'prod-b', 1);
    });

    it('answers 201 with the order, then 200 for a replay', async () => {
      const first = await checkout(SESSION, 'tok_approve', 'http-key-0001');
      const replay = await checkout(SESSION, 'tok_approve', 'http-key-0001');

      expect(first.statusCode).toBe(201);
      const placed = first.json<ApiResponse<CheckoutResult>>().data;
      expect(placed?.status).toBe('committed');
      expect(placed?.order.total).toBe(2500);

      expect(replay.statusCode).toBe(200);
      expect(replay.json<ApiResponse<CheckoutResult>>().data?.orderId).toBe(placed?.orderId);
    });

    it.each([
      ['tok_decline', 402, 'PAYMENT_DECLINED'],
      ['tok_error', 503, 'PAYMENT_ERROR'],
    ])('maps a %s outcome to %i', async (token, status, code) => {
      const response = await checkout(SESSION, token, 'http-key-0002');

      expect(response.statusCode).toBe(status);
      expect(response.json<ApiResponse>().code).toBe(code);
    });

    it('answers an empty cart with 400', async () => {
      const response = await checkout(OTHER_SESSION, 'tok_approve');

      expect(response.statusCode).toBe(400);
      expect(response.json<ApiResponse>().code).toBe('EMPTY_CART');
    });

    it('answers missing stock with 409', async () => {
      await ctx.container.inventory.setStock('prod-b', 0);

      const response = await checkout(SESSION, 'tok_approve');

      expect(response.statusCode).toBe(409);
      expect(response.json<ApiResponse>()).toMatchObject({
        code: 'INSUFFICIENT_STOCK',
        details: { productId: 'prod-b', requested: 1, available: 0 },
      });
    });

    it('requires payment details', async () => {
      const response = await app.inject({ method: 'POST', url: '/api/checkout', headers: SESSION, payload: {} });

      expect(response.statusCode).toBe(400);
      expect(response.json<ApiResponse>().code).toBe('VALIDATION_FAILED');
    });
  });

  describe('orders', () => {
    let orderId: string;

    beforeEach(async () => {
      await addItem(SESSION, 'prod-a', 1);
      const response = await checkout(SESSION, 'tok_approve', 'http-key-0003');
      orderId = response.json<ApiResponse<CheckoutResult>>().data?.orderId ?? '';
    });

    it('returns an order to its owner', async () => {
      const response = await app.inject({ method: 'GET', url: `/api/orders/${orderId}`, headers: SESSION });

      expect(response.statusCode).toBe(200);
      expect(response.json<ApiResponse<Order>>().data?.total).toBe(1000);
    });

    it('hides other owners’ orders', async () => {
      const response = await app.inject({ method: 'GET', url: `/api/orders/${orderId}`, headers: OTHER_SESSION });

      expect(response.statusCode).toBe(404);
      expect(response.json<ApiResponse>().code).toBe('NOT_FOUND');
    });

    it('pages through the owner’s orders', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/orders?page=1&limit=10', headers: SESSION });

      const body = response.json<PaginatedResponse<Order>>();
      expect(body.data?.map((order) => order.orderId)).toEqual([orderId]);
      expect(body.pagination).toEqual({ page: 1, limit: 10, total: 1, pages: 1, hasNext: false, hasPrev: false });
    });

    it('refuses a sort order it cannot apply', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/orders?order=asc', headers: SESSION });

      expect(response.statusCode).toBe(400);
      expect(response.json<ApiResponse>().code).toBe('VALIDATION_FAILED');
    });
  });

  describe('inventory administration', () => {
    it('is limited to admins', async () => {
      const asUser = await app.inject({ method: 'GET', url: '/api/inventory/prod-a', headers: bearer('user-1') });
      expect(asUser.statusCode).toBe(403);
      expect(asUser.json<ApiResponse>().code).toBe('FORBIDDEN');

      const asSession = await app.inject({ method: 'GET', url: '/api/inventory/prod-a', headers: SESSION });
      expect(asSession.statusCode).toBe(403);
    });

    it('reads and sets stock', async () => {
      const admin = bearer('admin-1', ['admin']);

      const updated = await app.inject({
        method: 'PUT',
        url: '/api/inventory/prod-a',
        headers: admin,
        payload: { available: 42 },
      });
      expect(updated.statusCode).toBe(200);

      const read = await app.inject({ method: 'GET', url: '/api/inventory/prod-a', headers: admin });
      expect(read.json<ApiResponse<ProductStock>>().data).toMatchObject({ productId: 'prod-a', available: 42, reserved: 0 });
    });
  });
});
