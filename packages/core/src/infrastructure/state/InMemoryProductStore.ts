import type { ProductStore, UpsertResult } from '../../domain/ports/ProductStore.js';
import type { Product, ProductRecord, SourcedRecord } from '../../domain/model/ProductRecord.js';
import { normalizeSku, PRODUCT_DEFAULTS } from '../../domain/model/ProductRecord.js';
import type { RowError } from '../../domain/model/RowError.js';

export interface InMemoryProductStoreOptions {
  /** Row-level check applied before a write; return a reason to refuse the row. */
  readonly rejectRecord?: (record: ProductRecord) => string | null;
  readonly now?: () => number;
}

/** Non-persistent product store, keyed by normalized SKU. */
export class InMemoryProductStore implements ProductStore {
  private readonly products = new Map<string, Product>();
  private readonly rejectRecord: (record: ProductRecord) => string | null;
  private readonly now: () => number;
  private nextId = 1;

  constructor(options: InMemoryProductStoreOptions = {}) {
    this.rejectRecord = options.rejectRecord ?? (() => null);
    this.now = options.now ?? Date.now;
  }

  upsertBatch(records: readonly SourcedRecord[]): Promise<UpsertResult> {
    let created = 0;
    let updated = 0;
    const errors: RowError[] = [];

    for (const { rowIndex, record } of records) {
      const reason = this.rejectRecord(record);
      if (reason !== null) {
        errors.push({ rowIndex, field: 'row', reason });
        continue;
      }

      const sku = normalizeSku(record.sku);
      const existing = this.products.get(sku);
      const timestamp = this.now();

      if (existing) {
        updated++;
        this.products.set(sku, {
          ...existing,
          name: record.name,
          description: record.description !== undefined ? record.description : existing.description,
          price: record.price !== undefined ? record.price : existing.price,
          quantity: record.quantity ?? existing.quantity,
          isActive: record.isActive ?? existing.isActive,
          updatedAt: timestamp,
        });
      } else {
        created++;
        this.products.set(sku, {
          id: this.nextId++,
          sku,
          name: record.name,
          description: record.description !== undefined ? record.description : PRODUCT_DEFAULTS.description,
          price: record.price !== undefined ? record.price : PRODUCT_DEFAULTS.price,
          quantity: record.quantity ?? PRODUCT_DEFAULTS.quantity,
          isActive: record.isActive ?? PRODUCT_DEFAULTS.isActive,
          createdAt: timestamp,
          updatedAt: timestamp,
        });
      }
    }

    return Promise.resolve({ created, updated, errors });
  }

  findBySku(sku: string): Promise<Product | null> {
    return Promise.resolve(this.products.get(normalizeSku(sku)) ?? null);
  }

  count(): Promise<number> {
    return Promise.resolve(this.products.size);
  }

  /** All products in insertion order. */
  all(): readonly Product[] {
    return [...this.products.values()];
  }
}
