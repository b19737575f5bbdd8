import { BaseRepository } from '@storefront/db';
import type { CatalogProduct } from '@storefront/types';

import { ProductModel, type ProductRecord } from '../models/product.model.js';
import type { CatalogRepository } from './types.js';

export class MongoCatalogRepository extends BaseRepository<ProductRecord> implements CatalogRepository {
  constructor() {
    super(ProductModel, 'products');
  }

  async findProduct(productId: string): Promise<CatalogProduct | null> {
    return this.trace('findProduct', async () => {
      const doc = await this.findOneDocument({ productId });
      if (!doc) {
        return null;
      }
      return {
        productId: doc.productId,
        sku: doc.sku,
        name: doc.name,
        price: doc.price,
        active: doc.active,
      };
    });
  }
}
