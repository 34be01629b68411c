import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { CartRecord, ProductRecord } from '../../domain/models.js';
import type { IInventoryStore } from './IInventoryStore.js';
import { PersistenceError } from '../../domain/errors/index.js';

export interface JsonFileInventoryStoreOptions {
  catalogFile: string;
  cartFile: string;
}

// blocking reads/writes so a reservation and its save finish together
export class JsonFileInventoryStore implements IInventoryStore {
  private readonly catalogFile: string;
  private readonly cartFile: string;

  constructor(options: JsonFileInventoryStoreOptions) {
    this.catalogFile = options.catalogFile;
    this.cartFile = options.cartFile;
  }

  loadCatalog(): unknown[] {
    return this.readArray(this.catalogFile);
  }

  saveCatalog(records: ProductRecord[]): void {
    this.writeArray(this.catalogFile, records);
  }

  loadCart(): unknown[] {
    return this.readArray(this.cartFile);
  }

  saveCart(records: CartRecord[]): void {
    this.writeArray(this.cartFile, records);
  }

  private readArray(file: string): unknown[] {
    // missing file means nothing stored yet
    if (!existsSync(file)) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(file, 'utf8'));
    } catch (err) {
      throw new PersistenceError('read', file, err);
    }

    if (!Array.isArray(parsed)) {
      throw new PersistenceError('read', file, new Error('expected a JSON array'));
    }
    return parsed;
  }

  private writeArray(file: string, records: readonly object[]): void {
    try {
      mkdirSync(dirname(file), { recursive: true });
      writeFileSync(file, JSON.stringify(records, null, 4), 'utf8');
    } catch (err) {
      throw new PersistenceError('write', file, err);
    }
  }
}
