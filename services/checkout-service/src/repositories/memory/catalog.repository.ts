import type { CatalogProduct } from '@storefront/types';

import type { CatalogRepository } from '../types.js';

export class InMemoryCatalogRepository implements CatalogRepository {
  private readonly products = new Map<string, CatalogProduct>();

  constructor(products: CatalogProduct[] = []) {
    products.forEach((product) => this.upsert(product));
  }

  upsert(product: CatalogProduct): void {
    this.products.set(product.productId, { ...product });
  }

  async findProduct(productId: string): Promise<CatalogProduct | null> {
    const product = this.products.get(productId);
    return product ? { ...product } : null;
  }
}
