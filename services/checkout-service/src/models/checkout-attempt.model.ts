import { Schema, model } from 'mongoose';

import { addBaseFields, type BaseFields } from '@storefront/db';
import type {
  CartItem,
  CheckoutFailure,
  CheckoutState,
  PaymentRecord,
  Reservation,
} from '@storefront/types';

import { cartItemSchema } from './cart.model.js';

export interface CartSnapshotRecord {
  ownerId: string;
  version: number;
  items: CartItem[];
  capturedAt: Date;
}

export interface CheckoutAttemptRecord extends BaseFields {
  checkoutId: string;
  idempotencyKey: string;
  ownerId: string;
  orderId: string;
  cart: CartSnapshotRecord;
  state: CheckoutState;
  revision: number;
  run: number;
  reservations: Reservation[];
  total: number;
  payment?: PaymentRecord;
  failure?: CheckoutFailure;
  deadline: Date;
}

const cartSnapshotSchema = new Schema<CartSnapshotRecord>(
  {
    ownerId: { type: String, required: true },
    version: { type: Number, required: true },
    items: { type: [cartItemSchema], default: [] },
    capturedAt: { type: Date, required: true },
  },
  { _id: false }
);

const heldReservationSchema = new Schema<Reservation>(
  {
    reservationId: { type: String, required: true },
    checkoutId: { type: String, required: true },
    productId: { type: String, required: true },
    quantity: { type: Number, required: true, min: 1 },
    status: { type: String, enum: ['pending', 'committed', 'released'], required: true },
    expiresAt: { type: Date, required: true },
    createdAt: { type: Date, required: true },
  },
  { _id: false }
);

const paymentSchema = new Schema<PaymentRecord>(
  {
    status: { type: String, enum: ['approved', 'declined', 'error'], required: true },
    provider: { type: String, required: true },
    amount: { type: Number, required: true, min: 0 },
    transactionId: { type: String },
    reason: { type: String },
    at: { type: Date, required: true },
  },
  { _id: false }
);

const failureSchema = new Schema<CheckoutFailure>(
  {
    code: { type: String, required: true },
    message: { type: String, required: true },
    retryable: { type: Boolean, required: true },
    details: { type: Schema.Types.Mixed },
  },
  { _id: false }
);

const checkoutAttemptSchema = new Schema<CheckoutAttemptRecord>({
  checkoutId: {
    type: String,
    required: true,
    unique: true,
  },
  idempotencyKey: {
    type: String,
    required: true,
    unique: true,
  },
  ownerId: {
    type: String,
    required: true,
  },
  orderId: {
    type: String,
    required: true,
  },
  cart: {
    type: cartSnapshotSchema,
    required: true,
  },
  state: {
    type: String,
    enum: ['initiated', 'validated', 'reserved', 'payment_pending', 'committed', 'rejected'],
    required: true,
  },
  revision: {
    type: Number,
    required: true,
    default: 0,
  },
  run: {
    type: Number,
    required: true,
    default: 1,
  },
  reservations: {
    type: [heldReservationSchema],
    default: [],
  },
  total: {
    type: Number,
    required: true,
    min: 0,
  },
  payment: {
    type: paymentSchema,
  },
  failure: {
    type: failureSchema,
  },
  deadline: {
    type: Date,
    required: true,
  },
});

addBaseFields(checkoutAttemptSchema);

checkoutAttemptSchema.index({ ownerId: 1, createdAt: -1 });
// Recovery sweep lookups
checkoutAttemptSchema.index({ state: 1, 'payment.status': 1 });
checkoutAttemptSchema.index({ state: 1, deadline: 1 });

export const CheckoutAttemptModel = model<CheckoutAttemptRecord>('CheckoutAttempt', checkoutAttemptSchema);
