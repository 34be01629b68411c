import { v4 as uuidv4 } from 'uuid';
import type { BaseLogger } from 'pino';
import type { CartEntry, CartView, Product, Receipt } from '../models.js';
import { describeEntry, roundCurrency, setReservedQuantity, toLineView } from '../models.js';
import { Catalog } from '../catalog/Catalog.js';
import { CartLedger } from '../cart/CartLedger.js';
import type { IInventoryStore } from '../../infrastructure/stores/IInventoryStore.js';
import {
  DomainError,
  InsufficientStockError,
  InvalidQuantityError,
  PersistenceError,
  QuantityUnchangedError,
  ResourceNotFoundError,
  ValidationError,
} from '../errors/index.js';

export type ReservationError =
  | ResourceNotFoundError
  | InsufficientStockError
  | InvalidQuantityError
  | QuantityUnchangedError;

export type ReservationResult =
  | { ok: true }
  | { ok: false; error: ReservationError };

const SUCCESS: ReservationResult = { ok: true };

/**
 * Moves stock between the catalog (available) and the cart (reserved).
 *
 * Rule violations come back as `{ ok: false, error }` with nothing changed.
 * Each successful mutation saves the cart exactly once; if that save throws,
 * the in-memory change is undone and the PersistenceError propagates.
 * The catalog is only written by saveCatalog() and checkout().
 */
export class ReservationService {
  constructor(
    private readonly catalog: Catalog,
    private readonly ledger: CartLedger,
    private readonly store: IInventoryStore,
    private readonly log?: BaseLogger
  ) {}

  // loads catalog first so the cart can be filtered against it
  static fromStore(store: IInventoryStore, log?: BaseLogger): ReservationService {
    const catalog = Catalog.load(store.loadCatalog());
    const ledger = CartLedger.load(store.loadCart(), catalog);
    log?.info(
      { products: catalog.size, cartEntries: ledger.size },
      'inventory loaded'
    );
    return new ReservationService(catalog, ledger, store, log);
  }

  addItem(productId: string, quantity: number): ReservationResult {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      return this.reject(
        'addItem',
        new InvalidQuantityError('Quantity must be a positive integer.')
      );
    }

    const product = this.catalog.get(productId);
    if (!product) {
      return this.reject('addItem', new ResourceNotFoundError('Product', productId));
    }
    if (product.availableQuantity < quantity) {
      return this.reject(
        'addItem',
        new InsufficientStockError(productId, quantity, product.availableQuantity)
      );
    }

    const existing = this.ledger.get(productId);

    if (existing) {
      setReservedQuantity(existing, existing.reservedQuantity + quantity);
    } else {
      this.ledger.set({ product, reservedQuantity: quantity });
    }
    this.catalog.decreaseAvailable(productId, quantity);

    this.persistCart(() => {
      this.catalog.increaseAvailable(productId, quantity);
      if (existing) {
        setReservedQuantity(existing, existing.reservedQuantity - quantity);
      } else {
        this.ledger.delete(productId);
      }
    });

    this.log?.info({ productId, quantity }, 'item added to cart');
    return SUCCESS;
  }

  removeItem(productId: string): ReservationResult {
    const entry = this.ledger.get(productId);
    if (!entry) {
      return this.reject('removeItem', new ResourceNotFoundError('Cart entry', productId));
    }

    const snapshot = this.ledger.entries();
    const released = entry.reservedQuantity;

    this.catalog.increaseAvailable(productId, released);
    this.ledger.delete(productId);

    this.persistCart(() => {
      this.catalog.decreaseAvailable(productId, released);
      this.restoreLedger(snapshot);
    });

    this.log?.info({ productId, released }, 'item removed from cart');
    return SUCCESS;
  }

  updateQuantity(productId: string, newQuantity: number): ReservationResult {
    if (!Number.isInteger(newQuantity) || newQuantity < 0) {
      return this.reject(
        'updateQuantity',
        new InvalidQuantityError('Quantity must be a non-negative integer.')
      );
    }

    const entry = this.ledger.get(productId);
    if (!entry) {
      return this.reject(
        'updateQuantity',
        new ResourceNotFoundError('Cart entry', productId)
      );
    }

    const previous = entry.reservedQuantity;
    const delta = newQuantity - previous;

    if (delta === 0) {
      // rejected even though nothing would change; callers rely on this
      return this.reject(
        'updateQuantity',
        new QuantityUnchangedError(productId, previous)
      );
    }

    if (delta > 0) {
      const available = entry.product.availableQuantity;
      if (available < delta) {
        return this.reject(
          'updateQuantity',
          new InsufficientStockError(productId, delta, available)
        );
      }
      setReservedQuantity(entry, newQuantity);
      this.catalog.decreaseAvailable(productId, delta);
    } else {
      setReservedQuantity(entry, newQuantity);
      this.catalog.increaseAvailable(productId, -delta);
    }

    this.persistCart(() => {
      setReservedQuantity(entry, previous);
      if (delta > 0) {
        this.catalog.increaseAvailable(productId, delta);
      } else {
        this.catalog.decreaseAvailable(productId, -delta);
      }
    });

    this.log?.info({ productId, from: previous, to: newQuantity }, 'cart quantity updated');
    return SUCCESS;
  }

  getTotal(): number {
    return this.ledger.total();
  }

  getEntries(): CartEntry[] {
    return this.ledger.entries();
  }

  getCart(): CartView {
    return {
      items: this.ledger.entries().map(toLineView),
      total: roundCurrency(this.getTotal()),
    };
  }

  getProduct(productId: string): Readonly<Product> | undefined {
    return this.catalog.get(productId);
  }

  listProducts(): Readonly<Product>[] {
    return this.catalog.list();
  }

  saveCatalog(): void {
    this.runSave(() => this.store.saveCatalog(this.catalog.serialize()));
    this.log?.info({ products: this.catalog.size }, 'catalog saved');
  }

  /**
   * Commits the reserved stock: the catalog (which already excludes it) is
   * saved, then the cart is emptied and saved.
   */
  checkout(): Receipt {
    if (this.ledger.isEmpty()) {
      throw new ValidationError('Cannot check out an empty cart.');
    }

    const entries = this.ledger.entries();
    const receipt: Receipt = {
      receiptId: uuidv4(),
      items: entries.map(toLineView),
      total: roundCurrency(this.ledger.total()),
      checkedOutAt: new Date(),
    };

    this.saveCatalog();

    this.ledger.clear();
    this.persistCart(() => this.restoreLedger(entries));

    this.log?.info(
      { receiptId: receipt.receiptId, total: receipt.total, lines: entries.map(describeEntry) },
      'checkout completed'
    );
    return receipt;
  }

  private persistCart(rollback: () => void): void {
    try {
      this.runSave(() => this.store.saveCart(this.ledger.serialize()));
    } catch (err) {
      rollback();
      throw err;
    }
  }

  // non-domain errors from the store are wrapped so callers see one failure type
  private runSave(save: () => void): void {
    try {
      save();
    } catch (err) {
      this.log?.error({ err }, 'inventory save failed');
      if (err instanceof DomainError) throw err;
      throw new PersistenceError('save', 'inventory', err);
    }
  }

  private restoreLedger(entries: CartEntry[]): void {
    this.ledger.clear();
    for (const entry of entries) {
      this.ledger.set(entry);
    }
  }

  private reject(operation: string, error: ReservationError): ReservationResult {
    this.log?.debug({ operation, code: error.code }, error.message);
    return { ok: false, error };
  }
}
