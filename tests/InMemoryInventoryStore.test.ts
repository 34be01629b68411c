import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryInventoryStore } from '../src/infrastructure/stores/InMemoryInventoryStore.js';
import type { CartRecord } from '../src/domain/models.js';
import { makeCatalogRecords } from './fixtures.js';

describe('InMemoryInventoryStore', () => {
  let store: InMemoryInventoryStore;

  beforeEach(() => {
    store = new InMemoryInventoryStore({ catalog: makeCatalogRecords() });
  });

  it('starts empty without a seed', () => {
    const empty = new InMemoryInventoryStore();

    expect(empty.loadCatalog()).toEqual([]);
    expect(empty.loadCart()).toEqual([]);
  });

  it('returns seeded catalog records', () => {
    expect(store.loadCatalog()).toEqual(makeCatalogRecords());
  });

  it('stores copies, not the caller arrays', () => {
    const records: CartRecord[] = [{ product_id: 'P1', quantity: 2 }];
    store.saveCart(records);
    records[0].quantity = 99;

    expect(store.loadCart()).toEqual([{ product_id: 'P1', quantity: 2 }]);
  });

  it('counts saves separately', () => {
    store.saveCart([]);
    store.saveCart([]);
    store.saveCatalog(makeCatalogRecords());

    expect(store.getCartSaveCount()).toBe(2);
    expect(store.getCatalogSaveCount()).toBe(1);
  });

  it('reset clears records and counters', () => {
    store.saveCart([{ product_id: 'P1', quantity: 1 }]);
    store.reset();

    expect(store.loadCart()).toEqual([]);
    expect(store.loadCatalog()).toEqual([]);
    expect(store.getCartSaveCount()).toBe(0);
  });
});
