import type { CartEntry, CartRecord } from '../models.js';
import { entrySubtotal, setReservedQuantity } from '../models.js';
import type { Catalog } from '../catalog/Catalog.js';
import { ValidationError } from '../errors/index.js';
import { CartRecordSchema, formatIssues } from '../schemas.js';

// reserved quantities per product, iterated in insertion order
export class CartLedger {
  private items: Map<string, CartEntry> = new Map();

  /**
   * Records whose product id is missing from the catalog are dropped
   * without error. A record without an integer quantity fails the load.
   */
  static load(records: readonly unknown[], catalog: Catalog): CartLedger {
    const ledger = new CartLedger();

    records.forEach((raw, index) => {
      const productId = readProductId(raw);
      if (productId === undefined) return;

      const product = catalog.get(productId);
      if (!product) return;

      const parsed = CartRecordSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ValidationError(
          `Invalid cart record at index ${index}: ${formatIssues(parsed.error)}`
        );
      }

      const entry: CartEntry = { product, reservedQuantity: 0 };
      setReservedQuantity(entry, parsed.data.quantity);
      ledger.items.set(productId, entry);
    });

    return ledger;
  }

  get(productId: string): CartEntry | undefined {
    return this.items.get(productId);
  }

  has(productId: string): boolean {
    return this.items.has(productId);
  }

  entries(): CartEntry[] {
    return [...this.items.values()];
  }

  get size(): number {
    return this.items.size;
  }

  isEmpty(): boolean {
    return this.items.size === 0;
  }

  set(entry: CartEntry): void {
    this.items.set(entry.product.productId, entry);
  }

  delete(productId: string): boolean {
    return this.items.delete(productId);
  }

  clear(): void {
    this.items.clear();
  }

  total(): number {
    return this.entries().reduce((sum, entry) => sum + entrySubtotal(entry), 0);
  }

  serialize(): CartRecord[] {
    return this.entries().map(entry => ({
      product_id: entry.product.productId,
      quantity: entry.reservedQuantity,
    }));
  }
}

function readProductId(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null || !('product_id' in raw)) {
    return undefined;
  }
  const id = raw.product_id;
  return typeof id === 'string' && id.length > 0 ? id : undefined;
}
