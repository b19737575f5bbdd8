import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { PaymentDeclinedError } from '../src/errors.js';
import { PAYMENT_GRACE_MS } from '../src/services/checkout.service.js';
import { APPROVE, DeferredGateway, START, createTestContext, secondsAfter, type TestContext } from './helpers.js';

const OWNER = 'session:recovery-0001';
const KEY = `${OWNER}:recovery-key`;

describe('RecoveryService', () => {
  let ctx: TestContext;

  const fillCart = async (): Promise<void> => {
    await ctx.container.carts.addItem(OWNER, 'prod-a', 2);
    await ctx.container.carts.addItem(OWNER, 'prod-b', 1);
  };

  const checkout = () =>
    ctx.container.checkout.checkout(OWNER, { idempotencyKey: 'recovery-key', paymentDetails: APPROVE });

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);
    ctx = await createTestContext();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('commits checkouts whose payment was approved before a crash', async () => {
    await fillCart();
    vi.spyOn(ctx.container.orders, 'append').mockRejectedValueOnce(new Error('connection reset'));
    await expect(checkout()).rejects.toThrow('connection reset');

    const report = await ctx.container.recovery.run();

    expect(report).toEqual({ finalized: 1, expired: 0, released: 0, failed: 0 });
    expect((await ctx.repositories.attempts.findByIdempotencyKey(KEY))?.state).toBe('committed');
    expect(await ctx.container.orders.countForOwner(OWNER)).toBe(1);
    expect((await ctx.container.carts.getCart(OWNER)).items).toEqual([]);
    expect((await ctx.container.inventory.getStock('prod-a')).reserved).toBe(0);
    expect(ctx.events.eventsOfType('order.created')).toHaveLength(1);
  });

  it('counts a commit that still fails and tries again on the next run', async () => {
    await fillCart();
    vi.spyOn(ctx.container.orders, 'append').mockRejectedValueOnce(new Error('connection reset'));
    await expect(checkout()).rejects.toThrow('connection reset');
    vi.spyOn(ctx.container.checkout, 'finalize').mockRejectedValueOnce(new Error('database unavailable'));

    expect(await ctx.container.recovery.run()).toEqual({ finalized: 0, expired: 0, released: 0, failed: 1 });
    expect(await ctx.container.recovery.run()).toEqual({ finalized: 1, expired: 0, released: 0, failed: 0 });
  });

  it('rejects abandoned attempts with TIMEOUT and returns their stock', async () => {
    await fillCart();
    const attempts = ctx.repositories.attempts;
    const update = attempts.update.bind(attempts);
    // The process dies after reserving, before the payment starts
    const crash = vi.spyOn(attempts, 'update').mockImplementation(async (checkoutId, revision, changes) => {
      if (changes.state === 'payment_pending') {
        throw new Error('process killed');
      }
      return update(checkoutId, revision, changes);
    });
    await expect(checkout()).rejects.toThrow('process killed');
    crash.mockRestore();
    expect((await ctx.container.inventory.getStock('prod-a')).available).toBe(8);

    expect(await ctx.container.recovery.run(secondsAfter(START, 899))).toEqual({
      finalized: 0,
      expired: 0,
      released: 0,
      failed: 0,
    });

    const report = await ctx.container.recovery.run(secondsAfter(START, 900));

    expect(report).toEqual({ finalized: 0, expired: 1, released: 0, failed: 0 });
    const attempt = await attempts.findByIdempotencyKey(KEY);
    expect(attempt?.state).toBe('rejected');
    expect(attempt?.failure?.code).toBe('TIMEOUT');
    expect((await ctx.container.inventory.getStock('prod-a')).available).toBe(10);
    expect((await ctx.container.inventory.getStock('prod-b')).available).toBe(10);
    expect(ctx.events.eventsOfType('checkout.rejected')[0]?.data).toMatchObject({ code: 'TIMEOUT', retryable: true });
  });

  it('gives an attempt waiting on the payment provider a grace period', async () => {
    const gateway = new DeferredGateway();
    ctx = await createTestContext({ payments: gateway });
    await fillCart();
    const pending = checkout().catch((e: unknown) => e);
    await vi.waitFor(() => expect(gateway.requests).toHaveLength(1));

    const deadline = secondsAfter(START, 900);
    expect(await ctx.container.recovery.run(secondsAfter(START, 901))).toEqual({
      finalized: 0,
      expired: 0,
      released: 0,
      failed: 0,
    });
    expect((await ctx.container.inventory.getStock('prod-a')).reserved).toBe(2);

    const report = await ctx.container.recovery.run(new Date(deadline.getTime() + PAYMENT_GRACE_MS));
    expect(report.expired).toBe(1);
    expect((await ctx.container.inventory.getStock('prod-a')).reserved).toBe(0);

    gateway.answer({ status: 'declined', reason: 'card_declined' });
    expect(await pending).toBeInstanceOf(PaymentDeclinedError);
    expect((await ctx.repositories.attempts.findByIdempotencyKey(KEY))?.failure?.code).toBe('TIMEOUT');
  });

  it('releases expired reservations that no checkout accounts for', async () => {
    await ctx.container.inventory.reserve('prod-a', 2, {
      checkoutId: 'chk-orphan',
      expiresAt: secondsAfter(START, 10),
    });

    const report = await ctx.container.recovery.run(secondsAfter(START, 11));

    expect(report).toEqual({ finalized: 0, expired: 0, released: 1, failed: 0 });
    expect((await ctx.container.inventory.getStock('prod-a')).available).toBe(10);
  });

  it('shares a sweep between overlapping runs', async () => {
    const [first, second] = await Promise.all([ctx.container.recovery.run(), ctx.container.recovery.run()]);

    expect(first).toBe(second);
  });

  it('starts and stops the periodic sweep', async () => {
    const run = vi.spyOn(ctx.container.recovery, 'run');

    ctx.container.recovery.start();
    ctx.container.recovery.start();
    await ctx.container.recovery.stop();

    expect(run).not.toHaveBeenCalled();
  });
});
