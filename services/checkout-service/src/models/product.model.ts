import { Schema, model } from 'mongoose';

import { addBaseFields, type BaseFields } from '@storefront/db';

/**
 * Read-only view of the catalog's product collection. Products are owned by
 * the catalog service; this service never writes them.
 */
export interface ProductRecord extends BaseFields {
  productId: string;
  sku: string;
  name: string;
  price: number;
  active: boolean;
}

const productSchema = new Schema<ProductRecord>({
  productId: {
    type: String,
    required: true,
    unique: true,
  },
  sku: {
    type: String,
    required: true,
    trim: true,
    maxlength: 50,
  },
  name: {
    type: String,
    required: true,
    trim: true,
    maxlength: 200,
  },
  price: {
    type: Number,
    required: true,
    min: 1,
  },
  active: {
    type: Boolean,
    default: true,
  },
});

addBaseFields(productSchema);

export const ProductModel = model<ProductRecord>('Product', productSchema);
