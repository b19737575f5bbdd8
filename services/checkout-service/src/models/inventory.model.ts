import { Schema, model } from 'mongoose';

import { addBaseFields, type BaseFields } from '@storefront/db';

export interface InventoryRecord extends BaseFields {
  productId: string;
  available: number;
  reserved: number;
}

const inventorySchema = new Schema<InventoryRecord>({
  productId: {
    type: String,
    required: true,
    unique: true,
  },
  available: {
    type: Number,
    required: true,
    min: 0,
    default: 0,
  },
  reserved: {
    type: Number,
    required: true,
    min: 0,
    default: 0,
  },
});

addBaseFields(inventorySchema);

inventorySchema.index({ available: 1 });

export const InventoryModel = model<InventoryRecord>('Inventory', inventorySchema);
