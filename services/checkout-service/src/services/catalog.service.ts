import type { CatalogProduct } from '@storefront/types';

import type { CatalogRepository } from '../repositories/types.js';

/** Read-only view of the product catalog. */
export class CatalogService {
  constructor(private readonly repository: CatalogRepository) {}

  async getProduct(productId: string): Promise<CatalogProduct | null> {
    return this.repository.findProduct(productId);
  }

  async getCurrentPrice(productId: string): Promise<number | null> {
    const product = await this.repository.findProduct(productId);
    return product ? product.price : null;
  }
}
