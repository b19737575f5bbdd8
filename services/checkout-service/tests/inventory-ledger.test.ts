import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { InMemoryEventBus } from '@storefront/event-bus';
import type { Reservation } from '@storefront/types';

import { InsufficientStockError, NotFoundError } from '../src/errors.js';
import { InMemoryInventoryRepository } from '../src/repositories/memory/inventory.repository.js';
import { InventoryLedger, type ReservationGuard } from '../src/services/inventory-ledger.service.js';
import { START, secondsAfter } from './helpers.js';

describe('InventoryLedger', () => {
  let repository: InMemoryInventoryRepository;
  let events: InMemoryEventBus;
  let ledger: InventoryLedger;

  const createLedger = (guard?: ReservationGuard): InventoryLedger =>
    new InventoryLedger(repository, events, { holdSeconds: 900, guard });

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);

    repository = new InMemoryInventoryRepository();
    events = new InMemoryEventBus();
    ledger = createLedger();
    await ledger.setStock('prod-a', 5);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('reserve', () => {
    it('moves units from available to reserved', async () => {
      const reservation = await ledger.reserve('prod-a', 3, { checkoutId: 'chk-1' });

      expect(reservation).toMatchObject({
        checkoutId: 'chk-1',
        productId: 'prod-a',
        quantity: 3,
        status: 'pending',
      });
      expect(reservation.expiresAt).toEqual(secondsAfter(START, 900));

      const stock = await ledger.getStock('prod-a');
      expect(stock.available).toBe(2);
      expect(stock.reserved).toBe(3);
    });

    it('uses an explicit expiry when given', async () => {
      const expiresAt = secondsAfter(START, 30);
      const reservation = await ledger.reserve('prod-a', 1, { checkoutId: 'chk-1', expiresAt });

      expect(reservation.expiresAt).toEqual(expiresAt);
    });

    it('fails with InsufficientStock and leaves the counters untouched', async () => {
      const error = await ledger.reserve('prod-a', 6, { checkoutId: 'chk-1' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InsufficientStockError);
      expect(error).toMatchObject({
        code: 'INSUFFICIENT_STOCK',
        details: { productId: 'prod-a', requested: 6, available: 5 },
      });

      const stock = await ledger.getStock('prod-a');
      expect(stock.available).toBe(5);
      expect(stock.reserved).toBe(0);
    });

    it('fails for a product without a stock row', async () => {
      await expect(ledger.reserve('prod-missing', 1, { checkoutId: 'chk-1' })).rejects.toMatchObject({
        details: { productId: 'prod-missing', requested: 1, available: 0 },
      });
    });

    it('rejects non-positive quantities', async () => {
      await expect(ledger.reserve('prod-a', 0, { checkoutId: 'chk-1' })).rejects.toBeInstanceOf(RangeError);
    });

    it('never oversells under concurrent reserves', async () => {
      const results = await Promise.allSettled(
        Array.from({ length: 10 }, (_, index) => ledger.reserve('prod-a', 1, { checkoutId: `chk-${index}` }))
      );

      expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(5);
      expect(results.filter((result) => result.status === 'rejected')).toHaveLength(5);

      const stock = await ledger.getStock('prod-a');
      expect(stock.available).toBe(0);
      expect(stock.reserved).toBe(5);
    });

    it('reclaims expired holds of the same product before failing', async () => {
      const stale = await ledger.reserve('prod-a', 5, {
        checkoutId: 'chk-abandoned',
        expiresAt: secondsAfter(START, 60),
      });
      vi.setSystemTime(secondsAfter(START, 61));

      const fresh = await ledger.reserve('prod-a', 3, { checkoutId: 'chk-2' });

      expect(fresh.status).toBe('pending');
      expect((await repository.findReservation(stale.reservationId))?.status).toBe('released');

      const stock = await ledger.getStock('prod-a');
      expect(stock.available).toBe(2);
      expect(stock.reserved).toBe(3);
    });

    it('publishes inventory.reserved', async () => {
      const reservation = await ledger.reserve('prod-a', 2, { checkoutId: 'chk-1' });

      const [event] = events.eventsOfType('inventory.reserved');
      expect(event?.id).toBe(reservation.reservationId);
      expect(event?.data).toEqual({
        reservationId: reservation.reservationId,
        checkoutId: 'chk-1',
        productId: 'prod-a',
        quantity: 2,
      });
    });
  });

  describe('release', () => {
    it('returns the units and is idempotent', async () => {
      const reservation = await ledger.reserve('prod-a', 3, { checkoutId: 'chk-1' });

      expect(await ledger.release(reservation)).toBe(true);
      expect(await ledger.release(reservation)).toBe(false);

      const stock = await ledger.getStock('prod-a');
      expect(stock.available).toBe(5);
      expect(stock.reserved).toBe(0);
    });

    it('does not release a committed reservation', async () => {
      const reservation = await ledger.reserve('prod-a', 3, { checkoutId: 'chk-1' });
      await ledger.commit(reservation);

      expect(await ledger.release(reservation)).toBe(false);
      expect((await ledger.getStock('prod-a')).available).toBe(2);
    });

    it('releases every pending hold of a checkout', async () => {
      await ledger.setStock('prod-b', 4);
      await ledger.reserve('prod-a', 1, { checkoutId: 'chk-1' });
      await ledger.reserve('prod-b', 2, { checkoutId: 'chk-1' });
      await ledger.reserve('prod-a', 1, { checkoutId: 'chk-other' });

      expect(await ledger.releaseForCheckout('chk-1')).toBe(2);

      expect((await ledger.getStock('prod-a')).available).toBe(4);
      expect((await ledger.getStock('prod-b')).available).toBe(4);
      expect(events.eventsOfType('inventory.released')).toHaveLength(2);
    });
  });

  describe('commit', () => {
    it('removes the units from reserved permanently and is idempotent', async () => {
      const reservation = await ledger.reserve('prod-a', 2, { checkoutId: 'chk-1' });

      expect(await ledger.commit(reservation)).toBe(true);
      expect(await ledger.commit(reservation)).toBe(false);

      const stock = await ledger.getStock('prod-a');
      expect(stock.available).toBe(3);
      expect(stock.reserved).toBe(0);
    });

    it('leaves the counters alone for a released reservation', async () => {
      const reservation = await ledger.reserve('prod-a', 2, { checkoutId: 'chk-1' });
      await ledger.release(reservation);

      expect(await ledger.commit(reservation)).toBe(false);

      const stock = await ledger.getStock('prod-a');
      expect(stock.available).toBe(5);
      expect(stock.reserved).toBe(0);
    });
  });

  describe('releaseExpired', () => {
    it('releases pending reservations past their expiry', async () => {
      await ledger.reserve('prod-a', 2, { checkoutId: 'chk-1', expiresAt: secondsAfter(START, 10) });
      await ledger.reserve('prod-a', 1, { checkoutId: 'chk-2', expiresAt: secondsAfter(START, 100) });

      expect(await ledger.releaseExpired({ now: secondsAfter(START, 10) })).toBe(1);

      const stock = await ledger.getStock('prod-a');
      expect(stock.available).toBe(4);
      expect(stock.reserved).toBe(1);

      const [event] = events.eventsOfType('inventory.released');
      expect(event?.data).toMatchObject({ checkoutId: 'chk-1', quantity: 2, reason: 'expired' });
    });

    it('keeps reservations the guard protects', async () => {
      ledger = createLedger(async (reservation) => reservation.checkoutId === 'chk-paid');
      await ledger.reserve('prod-a', 2, { checkoutId: 'chk-paid', expiresAt: secondsAfter(START, 10) });
      await ledger.reserve('prod-a', 1, { checkoutId: 'chk-idle', expiresAt: secondsAfter(START, 10) });

      expect(await ledger.releaseExpired({ now: secondsAfter(START, 20) })).toBe(1);

      const stock = await ledger.getStock('prod-a');
      expect(stock.available).toBe(3);
      expect(stock.reserved).toBe(2);
    });

    it('can be limited to one product', async () => {
      await ledger.setStock('prod-b', 3);
      await ledger.reserve('prod-a', 1, { checkoutId: 'chk-1', expiresAt: secondsAfter(START, 10) });
      await ledger.reserve('prod-b', 1, { checkoutId: 'chk-1', expiresAt: secondsAfter(START, 10) });

      expect(await ledger.releaseExpired({ productId: 'prod-b', now: secondsAfter(START, 20) })).toBe(1);
      expect((await ledger.getStock('prod-a')).reserved).toBe(1);
      expect((await ledger.getStock('prod-b')).reserved).toBe(0);
    });
  });

  describe('stock administration', () => {
    it('sets available stock without touching reserved units', async () => {
      await ledger.reserve('prod-a', 2, { checkoutId: 'chk-1' });

      const stock = await ledger.setStock('prod-a', 20);

      expect(stock.available).toBe(20);
      expect(stock.reserved).toBe(2);
    });

    it('refuses negative stock', async () => {
      await expect(ledger.setStock('prod-a', -1)).rejects.toBeInstanceOf(RangeError);
      expect((await ledger.getStock('prod-a')).available).toBe(5);
    });

    it('reports unknown products as not found', async () => {
      await expect(ledger.getStock('prod-missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('lists the reservations of a checkout', async () => {
      await ledger.setStock('prod-b', 3);
      await ledger.reserve('prod-b', 1, { checkoutId: 'chk-1' });
      await ledger.reserve('prod-a', 1, { checkoutId: 'chk-1' });

      const reservations = await ledger.listReservations('chk-1');

      expect(reservations.map((reservation) => reservation.productId)).toEqual(['prod-a', 'prod-b']);
    });

    it('forgets the oldest settled reservations past its history limit', async () => {
      repository = new InMemoryInventoryRepository(2);
      ledger = createLedger();
      await ledger.setStock('prod-a', 5);

      const held: Reservation[] = [];
      for (let i = 0; i < 3; i += 1) {
        held.push(await ledger.reserve('prod-a', 1, { checkoutId: 'chk-1' }));
      }
      for (const reservation of held) {
        await ledger.release(reservation);
      }

      const remembered = await ledger.listReservations('chk-1');
      expect(remembered.map((reservation) => reservation.reservationId).sort()).toEqual(
        [held[1]?.reservationId, held[2]?.reservationId].sort()
      );
      expect(await repository.findReservation(held[0]?.reservationId ?? '')).toBeNull();
      expect(await ledger.getStock('prod-a')).toMatchObject({ available: 5, reserved: 0 });
    });
  });
});
