import { randomUUID } from 'crypto';

import type { EventPublisher } from '@storefront/event-bus';
import { createChildLogger } from '@storefront/logger';
import { traceBusiness } from '@storefront/observability';
import type {
  InventoryReleasedEvent,
  InventoryReservedEvent,
  ProductStock,
  Reservation,
} from '@storefront/types';

import { InsufficientStockError, NotFoundError } from '../errors.js';
import { EventTypes, publishEvent } from '../events.js';
import type { InventoryRepository } from '../repositories/types.js';

const log = createChildLogger({ component: 'inventory-ledger' });

/** Returns true when an expired reservation must be kept (its checkout already holds a payment). */
export type ReservationGuard = (reservation: Reservation) => Promise<boolean>;

export interface ReserveOptions {
  checkoutId: string;
  expiresAt?: Date;
}

export interface InventoryLedgerOptions {
  /** Hold time used when a reservation is made without an explicit expiry. */
  holdSeconds: number;
  guard?: ReservationGuard;
}

export interface ReleaseExpiredOptions {
  productId?: string;
  now?: Date;
}

export class InventoryLedger {
  private readonly guard: ReservationGuard;

  constructor(
    private readonly repository: InventoryRepository,
    private readonly events: EventPublisher,
    private readonly options: InventoryLedgerOptions
  ) {
    this.guard = options.guard ?? (async () => false);
  }

  async reserve(productId: string, quantity: number, options: ReserveOptions): Promise<Reservation> {
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new RangeError(`Reservation quantity must be a positive integer, got ${quantity}`);
    }

    return traceBusiness('reserve', 'inventory', productId, async () => {
      const now = new Date();
      const reservation: Reservation = {
        reservationId: randomUUID(),
        checkoutId: options.checkoutId,
        productId,
        quantity,
        status: 'pending',
        expiresAt: options.expiresAt ?? new Date(now.getTime() + this.options.holdSeconds * 1000),
        createdAt: now,
      };

      let stock = await this.repository.reserve(reservation);

      // Holds left behind by abandoned checkouts are reclaimed before giving up
      if (!stock && (await this.releaseExpired({ productId, now })) > 0) {
        stock = await this.repository.reserve(reservation);
      }

      if (!stock) {
        const current = await this.repository.findStock(productId);
        throw new InsufficientStockError(productId, quantity, current?.available ?? 0);
      }

      log.debug(
        { reservationId: reservation.reservationId, checkoutId: options.checkoutId, productId, quantity },
        'Stock reserved'
      );

      await publishEvent<InventoryReservedEvent>(
        this.events,
        EventTypes.INVENTORY_RESERVED,
        {
          reservationId: reservation.reservationId,
          checkoutId: reservation.checkoutId,
          productId,
          quantity,
        },
        reservation.reservationId
      );

      return reservation;
    });
  }

  /** Returns false when the reservation was already released or committed. */
  async release(reservation: Pick<Reservation, 'reservationId'>): Promise<boolean> {
    return this.releaseWithReason(reservation.reservationId, 'released');
  }

  /** Releases every pending reservation held by a checkout. */
  async releaseForCheckout(checkoutId: string): Promise<number> {
    const reservations = await this.repository.findReservationsByCheckout(checkoutId);
    let released = 0;
    for (const reservation of reservations) {
      if (reservation.status === 'pending' && (await this.release(reservation))) {
        released += 1;
      }
    }
    return released;
  }

  /**
   * Makes a reservation's units permanently sold. Committing twice is a
   * no-op; committing a released reservation is reported as an alarm.
   */
  async commit(reservation: Pick<Reservation, 'reservationId'>): Promise<boolean> {
    const committed = await this.repository.commit(reservation.reservationId);
    if (committed) {
      return true;
    }

    const current = await this.repository.findReservation(reservation.reservationId);
    if (current?.status === 'released') {
      log.error(
        { reservationId: current.reservationId, checkoutId: current.checkoutId, productId: current.productId },
        'Consistency alarm: commit requested for a released reservation'
      );
    } else if (!current) {
      log.error({ reservationId: reservation.reservationId }, 'Consistency alarm: commit requested for an unknown reservation');
    }
    return false;
  }

  async releaseExpired(options: ReleaseExpiredOptions = {}): Promise<number> {
    const expired = await this.repository.findExpiredReservations(options.now ?? new Date(), options.productId);
    let released = 0;

    for (const reservation of expired) {
      if (await this.guard(reservation)) {
        log.debug(
          { reservationId: reservation.reservationId, checkoutId: reservation.checkoutId },
          'Expired reservation kept for a paid checkout'
        );
        continue;
      }
      if (await this.releaseWithReason(reservation.reservationId, 'expired')) {
        released += 1;
      }
    }

    if (released > 0) {
      log.info({ released, productId: options.productId }, 'Expired reservations released');
    }
    return released;
  }

  async getStock(productId: string): Promise<ProductStock> {
    const stock = await this.repository.findStock(productId);
    if (!stock) {
      throw new NotFoundError('Stock', productId);
    }
    return stock;
  }

  async setStock(productId: string, available: number): Promise<ProductStock> {
    if (!Number.isInteger(available) || available < 0) {
      throw new RangeError(`Available stock must be a non-negative integer, got ${available}`);
    }
    const stock = await this.repository.setAvailable(productId, available);
    log.info({ productId, available }, 'Stock level set');
    return stock;
  }

  async listReservations(checkoutId: string): Promise<Reservation[]> {
    return this.repository.findReservationsByCheckout(checkoutId);
  }

  private async releaseWithReason(
    reservationId: string,
    reason: InventoryReleasedEvent['reason']
  ): Promise<boolean> {
    const released = await this.repository.release(reservationId);
    if (!released) {
      return false;
    }

    log.debug({ reservationId, checkoutId: released.checkoutId, reason }, 'Reservation released');

    await publishEvent<InventoryReleasedEvent>(
      this.events,
      EventTypes.INVENTORY_RELEASED,
      {
        reservationId,
        checkoutId: released.checkoutId,
        productId: released.productId,
        quantity: released.quantity,
        reason,
      },
      `${reservationId}:released`
    );
    return true;
  }
}
