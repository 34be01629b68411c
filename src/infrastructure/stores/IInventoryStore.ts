import type { CartRecord, ProductRecord } from '../../domain/models.js';

// load returns raw records; Catalog and CartLedger validate them
export interface IInventoryStore {
  loadCatalog(): unknown[];
  saveCatalog(records: ProductRecord[]): void;
  loadCart(): unknown[];
  saveCart(records: CartRecord[]): void;
}
