import { Schema, model } from 'mongoose';

import type { Order, OrderItem, OrderPayment } from '@storefront/types';

export type OrderRecord = Order;

const orderItemSchema = new Schema<OrderItem>(
  {
    productId: { type: String, required: true },
    sku: { type: String, required: true },
    name: { type: String, required: true },
    quantity: { type: Number, required: true, min: 1 },
    unitPrice: { type: Number, required: true, min: 0 },
    lineTotal: { type: Number, required: true, min: 0 },
  },
  { _id: false }
);

const orderPaymentSchema = new Schema<OrderPayment>(
  {
    status: { type: String, enum: ['approved'], required: true },
    provider: { type: String, required: true },
    transactionId: { type: String, required: true },
    amount: { type: Number, required: true, min: 0 },
  },
  { _id: false }
);

// Orders are write-once: every path is immutable after insert
const orderSchema = new Schema<OrderRecord>({
  orderId: {
    type: String,
    required: true,
    unique: true,
    immutable: true,
  },
  orderNumber: {
    type: String,
    required: true,
    unique: true,
    immutable: true,
  },
  checkoutId: {
    type: String,
    required: true,
    immutable: true,
  },
  idempotencyKey: {
    type: String,
    required: true,
    unique: true,
    immutable: true,
  },
  ownerId: {
    type: String,
    required: true,
    immutable: true,
  },
  items: {
    type: [orderItemSchema],
    required: true,
    immutable: true,
    validate: {
      validator: (items: OrderItem[]) => items.length > 0,
      message: 'Order must have at least one item',
    },
  },
  total: {
    type: Number,
    required: true,
    min: 0,
    immutable: true,
  },
  payment: {
    type: orderPaymentSchema,
    required: true,
    immutable: true,
  },
  createdAt: {
    type: Date,
    required: true,
    immutable: true,
  },
});

orderSchema.index({ ownerId: 1, createdAt: -1 });

export const OrderModel = model<OrderRecord>('Order', orderSchema);
