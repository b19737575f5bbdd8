import type { HydratedDocument } from 'mongoose';

import { BaseRepository } from '@storefront/db';
import type { ProductStock, Reservation } from '@storefront/types';

import { InventoryModel, type InventoryRecord } from '../models/inventory.model.js';
import { ReservationModel, type ReservationRecord } from '../models/reservation.model.js';
import type { InventoryRepository } from './types.js';

function toStock(doc: HydratedDocument<InventoryRecord>): ProductStock {
  return {
    productId: doc.productId,
    available: doc.available,
    reserved: doc.reserved,
    updatedAt: doc.updatedAt,
  };
}

function toReservation(doc: HydratedDocument<ReservationRecord>): Reservation {
  return {
    reservationId: doc.reservationId,
    checkoutId: doc.checkoutId,
    productId: doc.productId,
    quantity: doc.quantity,
    status: doc.status,
    expiresAt: doc.expiresAt,
    createdAt: doc.createdAt,
  };
}

/**
 * MongoDB-backed stock ledger. Counter moves and reservation status changes
 * share a transaction, so the deployment must be a replica set.
 */
export class MongoInventoryRepository
  extends BaseRepository<InventoryRecord>
  implements InventoryRepository
{
  constructor() {
    super(InventoryModel, 'inventories');
  }

  async findStock(productId: string): Promise<ProductStock | null> {
    return this.trace('findStock', async () => {
      const doc = await this.findOneDocument({ productId });
      return doc ? toStock(doc) : null;
    });
  }

  async setAvailable(productId: string, available: number): Promise<ProductStock> {
    return this.trace('setAvailable', async () => {
      const doc = await this.model
        .findOneAndUpdate(
          { productId },
          { $set: { available }, $setOnInsert: { reserved: 0 } },
          { new: true, upsert: true }
        )
        .exec();
      if (!doc) {
        throw new Error(`Failed to upsert stock for ${productId}`);
      }
      return toStock(doc);
    });
  }

  async reserve(reservation: Reservation): Promise<ProductStock | null> {
    return this.trace('reserve', () =>
      this.model.db.transaction(async (session) => {
        const stock = await this.model
          .findOneAndUpdate(
            { productId: reservation.productId, available: { $gte: reservation.quantity } },
            { $inc: { available: -reservation.quantity, reserved: reservation.quantity } },
            { new: true, session }
          )
          .exec();

        if (!stock) {
          return null;
        }

        await ReservationModel.create(
          [
            {
              reservationId: reservation.reservationId,
              checkoutId: reservation.checkoutId,
              productId: reservation.productId,
              quantity: reservation.quantity,
              status: 'pending',
              expiresAt: reservation.expiresAt,
              createdAt: reservation.createdAt,
            },
          ],
          { session }
        );

        return toStock(stock);
      })
    );
  }

  async release(reservationId: string): Promise<Reservation | null> {
    return this.trace('release', () =>
      this.model.db.transaction(async (session) => {
        const reservation = await ReservationModel.findOneAndUpdate(
          { reservationId, status: 'pending' },
          { $set: { status: 'released' } },
          { new: true, session }
        ).exec();

        if (!reservation) {
          return null;
        }

        await this.model
          .updateOne(
            { productId: reservation.productId },
            { $inc: { available: reservation.quantity, reserved: -reservation.quantity } },
            { session }
          )
          .exec();

        return toReservation(reservation);
      })
    );
  }

  async commit(reservationId: string): Promise<Reservation | null> {
    return this.trace('commit', () =>
      this.model.db.transaction(async (session) => {
        const reservation = await ReservationModel.findOneAndUpdate(
          { reservationId, status: 'pending' },
          { $set: { status: 'committed' } },
          { new: true, session }
        ).exec();

        if (!reservation) {
          return null;
        }

        await this.model
          .updateOne(
            { productId: reservation.productId },
            { $inc: { reserved: -reservation.quantity } },
            { session }
          )
          .exec();

        return toReservation(reservation);
      })
    );
  }

  async findReservation(reservationId: string): Promise<Reservation | null> {
    return this.trace('findReservation', async () => {
      const doc = await ReservationModel.findOne({ reservationId }).exec();
      return doc ? toReservation(doc) : null;
    });
  }

  async findReservationsByCheckout(checkoutId: string): Promise<Reservation[]> {
    return this.trace('findReservationsByCheckout', async () => {
      const docs = await ReservationModel.find({ checkoutId }).sort({ productId: 1 }).exec();
      return docs.map(toReservation);
    });
  }

  async findExpiredReservations(now: Date, productId?: string): Promise<Reservation[]> {
    return this.trace('findExpiredReservations', async () => {
      const docs = await ReservationModel.find({
        status: 'pending',
        expiresAt: { $lte: now },
        ...(productId && { productId }),
      })
        .sort({ expiresAt: 1 })
        .exec();
      return docs.map(toReservation);
    });
  }
}
