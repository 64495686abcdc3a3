/** Header names understood by the product importer. Matching is case-insensitive. */
export const ProductColumn = {
  SKU: 'sku',
  NAME: 'name',
  DESCRIPTION: 'description',
  PRICE: 'price',
  QUANTITY: 'quantity',
  IS_ACTIVE: 'is_active',
} as const;

export type ProductColumn = (typeof ProductColumn)[keyof typeof ProductColumn];

export const REQUIRED_COLUMNS: readonly ProductColumn[] = [ProductColumn.SKU, ProductColumn.NAME];

export const PRODUCT_COLUMNS: readonly ProductColumn[] = Object.values(ProductColumn);

export function isProductColumn(value: string): value is ProductColumn {
  return PRODUCT_COLUMNS.some((column) => column === value);
}

/** Header cell → lookup key: trimmed, lower-cased, without a byte order mark. */
export function normalizeHeader(cell: string): string {
  return cell.replace(/^\uFEFF/, '').trim().toLowerCase();
}

/** Outcome of converting one cell. */
export type CellResult<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly reason: string };

const ok = <T>(value: T): CellResult<T> => ({ ok: true, value });
const invalid = <T>(reason: string): CellResult<T> => ({ ok: false, reason });

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const INTEGER = /^[+-]?\d+$/;
const TRUE_VALUES = new Set(['true', '1', 'yes', 'y', 't']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'n', 'f']);

export function convertSku(raw: string): CellResult<string> {
  const value = raw.trim();
  return value ? ok(value.toUpperCase()) : invalid('SKU is required');
}

export function convertName(raw: string): CellResult<string> {
  const value = raw.trim();
  return value ? ok(value) : invalid('Name is required');
}

export function convertDescription(raw: string): CellResult<string | null> {
  return ok(raw.trim() || null);
}

export function convertPrice(raw: string): CellResult<number | null> {
  const value = raw.trim();
  if (!value) return ok(null);
  if (!DECIMAL.test(value)) return invalid(`Invalid price format: ${value}`);
  const price = Number(value);
  return price < 0 ? invalid('Price cannot be negative') : ok(price);
}

export function convertQuantity(raw: string): CellResult<number> {
  const value = raw.trim();
  if (!value) return ok(0);
  const quantity = Number(value);
  if (!INTEGER.test(value) || !Number.isSafeInteger(quantity)) return invalid(`Invalid quantity format: ${value}`);
  return quantity < 0 ? invalid('Quantity cannot be negative') : ok(quantity);
}

export function convertIsActive(raw: string): CellResult<boolean> {
  const value = raw.trim().toLowerCase();
  if (!value) return ok(true);
  if (TRUE_VALUES.has(value)) return ok(true);
  if (FALSE_VALUES.has(value)) return ok(false);
  return invalid(`Invalid boolean value: ${raw.trim()}`);
}
