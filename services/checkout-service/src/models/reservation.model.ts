import { Schema, model } from 'mongoose';

import { addBaseFields, type BaseFields } from '@storefront/db';
import type { ReservationStatus } from '@storefront/types';

export interface ReservationRecord extends BaseFields {
  reservationId: string;
  checkoutId: string;
  productId: string;
  quantity: number;
  status: ReservationStatus;
  expiresAt: Date;
}

const reservationSchema = new Schema<ReservationRecord>({
  reservationId: {
    type: String,
    required: true,
    unique: true,
  },
  checkoutId: {
    type: String,
    required: true,
  },
  productId: {
    type: String,
    required: true,
  },
  quantity: {
    type: Number,
    required: true,
    min: 1,
  },
  status: {
    type: String,
    enum: ['pending', 'committed', 'released'],
    default: 'pending',
  },
  expiresAt: {
    type: Date,
    required: true,
  },
});

addBaseFields(reservationSchema);

reservationSchema.index({ checkoutId: 1 });
// Expiry sweep: pending reservations ordered by expiry, optionally per product
reservationSchema.index({ status: 1, expiresAt: 1 });
reservationSchema.index({ productId: 1, status: 1, expiresAt: 1 });

export const ReservationModel = model<ReservationRecord>('InventoryReservation', reservationSchema);
