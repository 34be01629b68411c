import type { Product, ProductRecord } from '../models.js';
import { setAvailableQuantity } from '../models.js';
import { ValidationError } from '../errors/index.js';
import {
  ProductRecordSchema,
  normalizeProductTag,
  formatIssues,
} from '../schemas.js';
import type { ParsedProductRecord } from '../schemas.js';

export function productFromRecord(record: ParsedProductRecord): Product {
  const common = {
    productId: record.product_id,
    name: record.name,
    price: record.price,
    availableQuantity: Math.max(0, record.quantity_available),
  };

  switch (record.type) {
    case 'physical':
      return { ...common, kind: 'physical', weight: record.weight };
    case 'digital':
      return { ...common, kind: 'digital', downloadLink: record.download_link };
    case 'base':
      return { ...common, kind: 'base' };
  }
}

export function productToRecord(product: Readonly<Product>): ProductRecord {
  const record: ProductRecord = {
    type: product.kind,
    product_id: product.productId,
    name: product.name,
    price: product.price,
    quantity_available: product.availableQuantity,
  };

  switch (product.kind) {
    case 'physical':
      return { ...record, weight: product.weight };
    case 'digital':
      return { ...record, download_link: product.downloadLink };
    case 'base':
      return record;
  }
}

/**
 * Products keyed by id, in load order.
 *
 * Available stock changes only through decreaseAvailable/increaseAvailable;
 * everything handed out is a read-only view of the stored instance, so cart
 * entries see stock changes as they happen.
 */
export class Catalog {
  private products: Map<string, Product> = new Map();

  /**
   * Builds a catalog from stored records. A record failing validation
   * aborts the whole load; a repeated id replaces the earlier product.
   */
  static load(records: readonly unknown[]): Catalog {
    const catalog = new Catalog();

    records.forEach((raw, index) => {
      const parsed = ProductRecordSchema.safeParse(normalizeProductTag(raw));
      if (!parsed.success) {
        throw new ValidationError(
          `Invalid product record at index ${index}: ${formatIssues(parsed.error)}`
        );
      }
      const product = productFromRecord(parsed.data);
      catalog.products.set(product.productId, product);
    });

    return catalog;
  }

  get(productId: string): Readonly<Product> | undefined {
    return this.products.get(productId);
  }

  has(productId: string): boolean {
    return this.products.has(productId);
  }

  list(): Readonly<Product>[] {
    return [...this.products.values()];
  }

  get size(): number {
    return this.products.size;
  }

  // subtracts only when 0 < amount <= available
  decreaseAvailable(productId: string, amount: number): boolean {
    const product = this.products.get(productId);
    if (!product) return false;
    if (amount <= 0 || amount > product.availableQuantity) return false;

    setAvailableQuantity(product, product.availableQuantity - amount);
    return true;
  }

  // no upper bound; returns stock from the cart
  increaseAvailable(productId: string, amount: number): boolean {
    const product = this.products.get(productId);
    if (!product) return false;

    setAvailableQuantity(product, product.availableQuantity + amount);
    return true;
  }

  serialize(): ProductRecord[] {
    return this.list().map(productToRecord);
  }
}
