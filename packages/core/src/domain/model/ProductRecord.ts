import type { RowError } from './RowError.js';

/**
 * A validated product row ready to be written.
 *
 * Optional properties are omitted when the source has no such column, so an
 * update never touches a field the file did not carry. A present column with
 * a blank cell yields the default value instead.
 */
export interface ProductRecord {
  readonly sku: string;
  readonly name: string;
  readonly description?: string | null;
  readonly price?: number | null;
  readonly quantity?: number;
  readonly isActive?: boolean;
}

export type OptionalProductField = 'description' | 'price' | 'quantity' | 'isActive';

export const OPTIONAL_PRODUCT_FIELDS: readonly OptionalProductField[] = ['description', 'price', 'quantity', 'isActive'];

/** Values applied on insert for fields a record does not carry. */
export const PRODUCT_DEFAULTS = {
  description: null,
  price: null,
  quantity: 0,
  isActive: true,
} as const;

/** A record together with the source row it came from. */
export interface SourcedRecord {
  readonly rowIndex: number;
  readonly record: ProductRecord;
}

/** Outcome of parsing one data row. */
export type ParsedRow =
  | { readonly ok: true; readonly rowIndex: number; readonly record: ProductRecord }
  | { readonly ok: false; readonly rowIndex: number; readonly errors: readonly RowError[] };

/** Stored product. Timestamps are epoch milliseconds. */
export interface Product {
  readonly id: number;
  readonly sku: string;
  readonly name: string;
  readonly description: string | null;
  readonly price: number | null;
  readonly quantity: number;
  readonly isActive: boolean;
  readonly createdAt: number;
  readonly updatedAt: number;
}

/** Canonical SKU form used as the product key. */
export function normalizeSku(raw: string): string {
  return raw.trim().toUpperCase();
}

/** Optional fields carried by at least one record, in declaration order. */
export function presentOptionalFields(records: readonly ProductRecord[]): OptionalProductField[] {
  return OPTIONAL_PRODUCT_FIELDS.filter((field) => records.some((record) => record[field] !== undefined));
}
