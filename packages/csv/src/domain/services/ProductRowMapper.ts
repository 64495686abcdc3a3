import type { ParsedRow, ProductRecord, RowError } from '@product-importer/core';
import { rowError } from '@product-importer/core';
import type { CellResult } from '../model/ProductColumns.js';
import {
  ProductColumn,
  REQUIRED_COLUMNS,
  isProductColumn,
  normalizeHeader,
  convertSku,
  convertName,
  convertDescription,
  convertPrice,
  convertQuantity,
  convertIsActive,
} from '../model/ProductColumns.js';
import { MissingColumnsError } from '../errors.js';

const REPLACEMENT_CHARACTER = '\uFFFD';

/**
 * Maps data rows to product records according to one file's header.
 *
 * Unrecognised columns are ignored. When a column appears twice the first
 * occurrence wins.
 */
export class ProductRowMapper {
  readonly columns: readonly string[];
  private readonly positions = new Map<ProductColumn, number>();

  /** @throws MissingColumnsError when `sku` or `name` is absent. */
  constructor(header: readonly string[]) {
    this.columns = header.map(normalizeHeader);
    this.columns.forEach((column, index) => {
      if (isProductColumn(column) && !this.positions.has(column)) {
        this.positions.set(column, index);
      }
    });

    const missing = REQUIRED_COLUMNS.filter((column) => !this.positions.has(column));
    if (missing.length > 0) {
      throw new MissingColumnsError(missing);
    }
  }

  has(column: ProductColumn): boolean {
    return this.positions.has(column);
  }

  map(cells: readonly string[], rowIndex: number): ParsedRow {
    if (cells.length !== this.columns.length) {
      return this.reject(rowIndex, [
        rowError(
          rowIndex,
          'row',
          `Expected ${String(this.columns.length)} columns but found ${String(cells.length)}`,
        ),
      ]);
    }

    const errors: RowError[] = [];
    for (const [column, position] of this.positions) {
      if ((cells[position] ?? '').includes(REPLACEMENT_CHARACTER)) {
        errors.push(rowError(rowIndex, column, 'Malformed character encoding'));
      }
    }
    if (errors.length > 0) return this.reject(rowIndex, errors);

    const read = <T>(column: ProductColumn, convert: (raw: string) => CellResult<T>): T | undefined => {
      const position = this.positions.get(column);
      if (position === undefined) return undefined;
      const result = convert(cells[position] ?? '');
      if (result.ok) return result.value;
      errors.push(rowError(rowIndex, column, result.reason));
      return undefined;
    };

    const sku = read(ProductColumn.SKU, convertSku);
    const name = read(ProductColumn.NAME, convertName);
    const description = read(ProductColumn.DESCRIPTION, convertDescription);
    const price = read(ProductColumn.PRICE, convertPrice);
    const quantity = read(ProductColumn.QUANTITY, convertQuantity);
    const isActive = read(ProductColumn.IS_ACTIVE, convertIsActive);

    if (errors.length > 0 || sku === undefined || name === undefined) {
      return this.reject(rowIndex, errors);
    }

    const record: ProductRecord = {
      sku,
      name,
      ...(description !== undefined ? { description } : {}),
      ...(price !== undefined ? { price } : {}),
      ...(quantity !== undefined ? { quantity } : {}),
      ...(isActive !== undefined ? { isActive } : {}),
    };
    return { ok: true, rowIndex, record };
  }

  private reject(rowIndex: number, errors: readonly RowError[]): ParsedRow {
    return { ok: false, rowIndex, errors };
  }
}
