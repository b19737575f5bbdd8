import type { ProductStock, Reservation } from '@storefront/types';

import type { InventoryRepository } from '../types.js';

/**
 * Single-process stock ledger. Each operation completes its check and update
 * without yielding, which makes it atomic with respect to other callers.
 * Settled reservations are forgotten once more than `settledHistory` of them
 * have piled up.
 */
export class InMemoryInventoryRepository implements InventoryRepository {
  private readonly stock = new Map<string, ProductStock>();
  private readonly reservations = new Map<string, Reservation>();
  private readonly settled: string[] = [];

  constructor(private readonly settledHistory = 1000) {}

  async findStock(productId: string): Promise<ProductStock | null> {
    const row = this.stock.get(productId);
    return row ? { ...row } : null;
  }

  async setAvailable(productId: string, available: number): Promise<ProductStock> {
    const row: ProductStock = {
      productId,
      available,
      reserved: this.stock.get(productId)?.reserved ?? 0,
      updatedAt: new Date(),
    };
    this.stock.set(productId, row);
    return { ...row };
  }

  async reserve(reservation: Reservation): Promise<ProductStock | null> {
    const row = this.stock.get(reservation.productId);
    if (!row || row.available < reservation.quantity) {
      return null;
    }

    row.available -= reservation.quantity;
    row.reserved += reservation.quantity;
    row.updatedAt = new Date();
    this.reservations.set(reservation.reservationId, { ...reservation, status: 'pending' });
    return { ...row };
  }

  async release(reservationId: string): Promise<Reservation | null> {
    return this.settle(reservationId, 'released');
  }

  async commit(reservationId: string): Promise<Reservation | null> {
    return this.settle(reservationId, 'committed');
  }

  async findReservation(reservationId: string): Promise<Reservation | null> {
    const reservation = this.reservations.get(reservationId);
    return reservation ? { ...reservation } : null;
  }

  async findReservationsByCheckout(checkoutId: string): Promise<Reservation[]> {
    return [...this.reservations.values()]
      .filter((reservation) => reservation.checkoutId === checkoutId)
      .sort((a, b) => a.productId.localeCompare(b.productId))
      .map((reservation) => ({ ...reservation }));
  }

  async findExpiredReservations(now: Date, productId?: string): Promise<Reservation[]> {
    return [...this.reservations.values()]
      .filter(
        (reservation) =>
          reservation.status === 'pending' &&
          reservation.expiresAt.getTime() <= now.getTime() &&
          (productId === undefined || reservation.productId === productId)
      )
      .sort((a, b) => a.expiresAt.getTime() - b.expiresAt.getTime())
      .map((reservation) => ({ ...reservation }));
  }

  private settle(reservationId: string, status: 'released' | 'committed'): Reservation | null {
    const reservation = this.reservations.get(reservationId);
    if (!reservation || reservation.status !== 'pending') {
      return null;
    }

    const row = this.stock.get(reservation.productId);
    if (row) {
      if (status === 'released') {
        row.available += reservation.quantity;
      }
      row.reserved -= reservation.quantity;
      row.updatedAt = new Date();
    }

    reservation.status = status;
    this.settled.push(reservationId);
    for (const forgotten of this.settled.splice(0, Math.max(0, this.settled.length - this.settledHistory))) {
      this.reservations.delete(forgotten);
    }
    return { ...reservation };
  }
}
