import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/index.js';
import { loadConfig } from '../src/config.js';
import { InMemoryInventoryStore } from '../src/infrastructure/stores/InMemoryInventoryStore.js';
import { PersistenceError } from '../src/domain/errors/index.js';
import { makeCatalogRecords } from './fixtures.js';

describe('HTTP API', () => {
  let app: FastifyInstance;
  let store: InMemoryInventoryStore;

  beforeEach(async () => {
    store = new InMemoryInventoryStore({ catalog: makeCatalogRecords() });
    app = await buildApp({
      config: loadConfig({ LOG_LEVEL: 'silent' }),
      store,
    });
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe('ok');
  });

  describe('products', () => {
    it('lists products with display details', async () => {
      const res = await app.inject({ method: 'GET', url: '/v1/products' });
      const body = res.json();

      expect(res.statusCode).toBe(200);
      expect(body.data).toHaveLength(3);
      expect(body.data[1]).toEqual({
        kind: 'physical',
        productId: 'P2',
        name: 'Kettle',
        price: 12.5,
        availableQuantity: 3,
        weight: 1.2,
        details: 'P2 | Kettle | ₹12.5 | Stock: 3 | Weight: 1.2kg',
      });
    });

    it('returns one product', async () => {
      const res = await app.inject({ method: 'GET', url: '/v1/products/D1' });

      expect(res.statusCode).toBe(200);
      expect(res.json().data.details).toBe(
        'D1 | Recipe eBook | ₹7 | Download: https://downloads.test/recipes'
      );
    });

    it('404s for unknown products', async () => {
      const res = await app.inject({ method: 'GET', url: '/v1/products/nope' });

      expect(res.statusCode).toBe(404);
      expect(res.json().error.code).toBe('RESOURCE_NOT_FOUND');
    });
  });

  describe('cart', () => {
    it('starts empty', async () => {
      const res = await app.inject({ method: 'GET', url: '/v1/cart' });

      expect(res.json().data).toEqual({ items: [], total: 0 });
    });

    it('adds an item and returns the cart', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/v1/cart/items',
        payload: { productId: 'P1', quantity: 4 },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().data).toEqual({
        items: [{ productId: 'P1', name: 'Notebook', unitPrice: 5, quantity: 4, subtotal: 20 }],
        total: 20,
      });

      const product = await app.inject({ method: 'GET', url: '/v1/products/P1' });
      expect(product.json().data.availableQuantity).toBe(6);
    });

    it('409s on insufficient stock', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/v1/cart/items',
        payload: { productId: 'P1', quantity: 20 },
      });

      expect(res.statusCode).toBe(409);
      expect(res.json().error.code).toBe('INSUFFICIENT_STOCK');
    });

    it('400s when the body fails schema validation', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/v1/cart/items',
        payload: { productId: 'P1', quantity: 0 },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error.code).toBe('VALIDATION_ERROR');
    });

    it('updates a quantity', async () => {
      await app.inject({ method: 'POST', url: '/v1/cart/items', payload: { productId: 'P1', quantity: 4 } });
      const res = await app.inject({
        method: 'PATCH',
        url: '/v1/cart/items/P1',
        payload: { quantity: 2 },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().data.total).toBe(10);
    });

    it('409s when the quantity is unchanged', async () => {
      await app.inject({ method: 'POST', url: '/v1/cart/items', payload: { productId: 'P1', quantity: 4 } });
      const res = await app.inject({
        method: 'PATCH',
        url: '/v1/cart/items/P1',
        payload: { quantity: 4 },
      });

      expect(res.statusCode).toBe(409);
      expect(res.json().error.code).toBe('QUANTITY_UNCHANGED');
    });

    it('removes an item', async () => {
      await app.inject({ method: 'POST', url: '/v1/cart/items', payload: { productId: 'P1', quantity: 4 } });
      const res = await app.inject({ method: 'DELETE', url: '/v1/cart/items/P1' });

      expect(res.statusCode).toBe(200);
      expect(res.json().data).toEqual({ items: [], total: 0 });
    });

    it('404s when removing an item that is not in the cart', async () => {
      const res = await app.inject({ method: 'DELETE', url: '/v1/cart/items/P1' });

      expect(res.statusCode).toBe(404);
    });

    it('checks out', async () => {
      await app.inject({ method: 'POST', url: '/v1/cart/items', payload: { productId: 'D1', quantity: 2 } });
      const res = await app.inject({ method: 'POST', url: '/v1/cart/checkout' });
      const body = res.json();

      expect(res.statusCode).toBe(200);
      expect(body.data.total).toBe(14);
      expect(body.data.items).toHaveLength(1);
      expect(store.getCatalogSaveCount()).toBe(1);
    });

    it('400s when checking out an empty cart', async () => {
      const res = await app.inject({ method: 'POST', url: '/v1/cart/checkout' });

      expect(res.statusCode).toBe(400);
      expect(res.json().error.code).toBe('VALIDATION_ERROR');
    });

    it('500s with PERSISTENCE_FAILURE when the cart cannot be saved', async () => {
      vi.spyOn(store, 'saveCart').mockImplementation(() => {
        throw new PersistenceError('write', 'cart.json');
      });

      const res = await app.inject({
        method: 'POST',
        url: '/v1/cart/items',
        payload: { productId: 'P1', quantity: 1 },
      });

      expect(res.statusCode).toBe(500);
      expect(res.json().error.code).toBe('PERSISTENCE_FAILURE');

      const cart = await app.inject({ method: 'GET', url: '/v1/cart' });
      expect(cart.json().data.items).toEqual([]);
    });
  });
});
