import { Schema, model } from 'mongoose';

import { addBaseFields, type BaseFields } from '@storefront/db';
import type { CartItem } from '@storefront/types';

export interface CartRecord extends BaseFields {
  ownerId: string;
  items: CartItem[];
  version: number;
  settledCheckoutIds: string[];
}

export const cartItemSchema = new Schema<CartItem>(
  {
    productId: {
      type: String,
      required: true,
    },
    name: {
      type: String,
      required: true,
      maxlength: 200,
    },
    quantity: {
      type: Number,
      required: true,
      min: 1,
    },
    unitPrice: {
      type: Number,
      required: true,
      min: 0,
    },
    addedAt: {
      type: Date,
      required: true,
    },
  },
  { _id: false }
);

const cartSchema = new Schema<CartRecord>({
  ownerId: {
    type: String,
    required: true,
    unique: true,
  },
  items: {
    type: [cartItemSchema],
    default: [],
  },
  version: {
    type: Number,
    required: true,
    min: 0,
    default: 0,
  },
  settledCheckoutIds: {
    type: [String],
    default: [],
  },
});

addBaseFields(cartSchema);

cartSchema.index({ updatedAt: -1 });

export const CartModel = model<CartRecord>('Cart', cartSchema);
