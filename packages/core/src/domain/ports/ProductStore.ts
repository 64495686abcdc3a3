import type { Product, SourcedRecord } from '../model/ProductRecord.js';
import type { RowError } from '../model/RowError.js';

export interface UpsertResult {
  readonly created: number;
  readonly updated: number;
  /** One entry per row the store refused. */
  readonly errors: readonly RowError[];
}

/**
 * Port for writing products keyed by SKU.
 *
 * `upsertBatch` applies the records as if one after another in the order
 * given, so a later row for the same SKU wins. Each accepted row counts once:
 * `created` when its SKU did not exist before it, `updated` otherwise.
 * `created + updated + errors.length` equals the number of records.
 *
 * A row the store refuses (constraint or value violation) becomes a row
 * error. Anything that stops the whole batch from being written (lost
 * connection, missing table) must be thrown.
 */
export interface ProductStore {
  upsertBatch(records: readonly SourcedRecord[]): Promise<UpsertResult>;
  findBySku(sku: string): Promise<Product | null>;
  count(): Promise<number>;
}
