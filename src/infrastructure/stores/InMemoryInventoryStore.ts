import type { CartRecord, ProductRecord } from '../../domain/models.js';
import type { IInventoryStore } from './IInventoryStore.js';

export interface InMemoryInventorySeed {
  catalog?: unknown[];
  cart?: unknown[];
}

// in-memory store for tests and local runs; copies records in and out
export class InMemoryInventoryStore implements IInventoryStore {
  private catalog: unknown[];
  private cart: unknown[];
  private catalogSaves = 0;
  private cartSaves = 0;

  constructor(seed: InMemoryInventorySeed = {}) {
    this.catalog = structuredClone(seed.catalog ?? []);
    this.cart = structuredClone(seed.cart ?? []);
  }

  loadCatalog(): unknown[] {
    return structuredClone(this.catalog);
  }

  saveCatalog(records: ProductRecord[]): void {
    this.catalog = structuredClone(records);
    this.catalogSaves++;
  }

  loadCart(): unknown[] {
    return structuredClone(this.cart);
  }

  saveCart(records: CartRecord[]): void {
    this.cart = structuredClone(records);
    this.cartSaves++;
  }

  // Utility methods for testing
  getCatalogSaveCount(): number {
    return this.catalogSaves;
  }

  getCartSaveCount(): number {
    return this.cartSaves;
  }

  reset(): void {
    this.catalog = [];
    this.cart = [];
    this.catalogSaves = 0;
    this.cartSaves = 0;
  }
}
