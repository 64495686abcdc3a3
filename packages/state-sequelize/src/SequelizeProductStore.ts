import {
  DatabaseError,
  ExclusionConstraintError,
  ForeignKeyConstraintError,
  Op,
  UniqueConstraintError,
  ValidationError,
} from 'sequelize';
import type { Sequelize, Transaction } from 'sequelize';
import type { Product, ProductRecord, ProductStore, RowError, SourcedRecord, UpsertResult } from '@product-importer/core';
import { normalizeSku, presentOptionalFields, rowError } from '@product-importer/core';
import { defineProductModel, NAME_MAX_LENGTH, PRICE_MAX, QUANTITY_MAX, SKU_MAX_LENGTH } from './models/ProductModel.js';
import type { ProductModel, ProductRow } from './models/ProductModel.js';
import * as ProductMapper from './mappers/ProductMapper.js';

/** All rows of one SKU in a batch, folded into the values the last of them leaves behind. */
interface SkuGroup {
  readonly sku: string;
  record: ProductRecord;
}

const bySku = (a: SkuGroup, b: SkuGroup): number => (a.sku < b.sku ? -1 : a.sku > b.sku ? 1 : 0);

function checkRecord(rowIndex: number, record: ProductRecord): RowError | null {
  if (normalizeSku(record.sku).length > SKU_MAX_LENGTH) {
    return rowError(rowIndex, 'sku', `SKU exceeds ${String(SKU_MAX_LENGTH)} characters`);
  }
  if (record.name.length > NAME_MAX_LENGTH) {
    return rowError(rowIndex, 'name', `Name exceeds ${String(NAME_MAX_LENGTH)} characters`);
  }
  if (record.price !== undefined && record.price !== null && record.price > PRICE_MAX) {
    return rowError(rowIndex, 'price', `Price exceeds ${String(PRICE_MAX)}`);
  }
  if (record.quantity !== undefined && record.quantity > QUANTITY_MAX) {
    return rowError(rowIndex, 'quantity', `Quantity exceeds ${String(QUANTITY_MAX)}`);
  }
  return null;
}

/** Failures that belong to the rows being written rather than to the database. */
function isRowScoped(error: unknown): boolean {
  if (error instanceof ValidationError) return true;
  if (error instanceof ForeignKeyConstraintError || error instanceof ExclusionConstraintError) return true;
  if (error instanceof DatabaseError) {
    const original: unknown = error.original;
    const code = typeof original === 'object' && original !== null && 'code' in original ? original.code : null;
    // SQLSTATE classes 22 (data exception) and 23 (integrity constraint violation)
    return typeof code === 'string' && (/^2[23][0-9A-Z]{3}$/.test(code) || code.startsWith('SQLITE_CONSTRAINT'));
  }
  return false;
}

function failureReason(error: unknown): string {
  if (error instanceof UniqueConstraintError) {
    return error.parent.message;
  }
  if (error instanceof ValidationError) {
    return error.errors[0]?.message ?? error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Product upserts keyed by SKU, one transaction per batch.
 *
 * The batch is folded to one row per SKU and written with a single
 * insert-or-update per column set, in SKU order so concurrent imports lock
 * shared rows in the same sequence. When the database refuses that statement
 * because of a row, each SKU is retried alone in its own savepoint so only the
 * offending rows are reported. Connection and schema errors are thrown.
 *
 * Call `initialize()` after construction to create the table.
 */
export class SequelizeProductStore implements ProductStore {
  private readonly sequelize: Sequelize;
  private readonly Product: ProductModel;

  constructor(sequelize: Sequelize) {
    this.sequelize = sequelize;
    this.Product = defineProductModel(sequelize);
  }

  async initialize(): Promise<void> {
    await this.Product.sync();
  }

  async upsertBatch(records: readonly SourcedRecord[]): Promise<UpsertResult> {
    const errors: RowError[] = [];
    const accepted: SourcedRecord[] = [];
    for (const sourced of records) {
      const problem = checkRecord(sourced.rowIndex, sourced.record);
      if (problem) errors.push(problem);
      else accepted.push(sourced);
    }
    if (accepted.length === 0) return { created: 0, updated: 0, errors };

    const groups = [...this.groupBySku(accepted).values()].sort(bySku);

    return this.sequelize.transaction(async (transaction) => {
      const existing = await this.existingSkus(groups.map((group) => group.sku), transaction);
      const rejected = await this.write(groups, transaction);

      let created = 0;
      let updated = 0;
      const seen = new Set(existing);
      for (const { rowIndex, record } of accepted) {
        const sku = normalizeSku(record.sku);
        const reason = rejected.get(sku);
        if (reason !== undefined) {
          errors.push(rowError(rowIndex, 'row', reason));
        } else if (seen.has(sku)) {
          updated++;
        } else {
          created++;
          seen.add(sku);
        }
      }

      return { created, updated, errors };
    });
  }

  async findBySku(sku: string): Promise<Product | null> {
    const row = await this.Product.findOne({ where: { sku: normalizeSku(sku) } });
    return row ? ProductMapper.toDomain(row.get({ plain: true })) : null;
  }

  async count(): Promise<number> {
    return this.Product.count();
  }

  private groupBySku(records: readonly SourcedRecord[]): Map<string, SkuGroup> {
    const groups = new Map<string, SkuGroup>();
    for (const { record } of records) {
      const sku = normalizeSku(record.sku);
      const group = groups.get(sku);
      if (group) {
        group.record = { ...group.record, ...record };
      } else {
        groups.set(sku, { sku, record });
      }
    }
    return groups;
  }

  private async existingSkus(skus: readonly string[], transaction: Transaction): Promise<Set<string>> {
    const rows = await this.Product.findAll({
      attributes: ['sku'],
      where: { sku: { [Op.in]: skus } },
      transaction,
    });
    return new Set(rows.map((row) => row.get({ plain: true }).sku));
  }

  /** Returns the refusal reason per SKU; empty when everything was written. */
  private async write(groups: readonly SkuGroup[], transaction: Transaction): Promise<Map<string, string>> {
    const rejected = new Map<string, string>();
    try {
      await this.sequelize.transaction({ transaction }, (savepoint) => this.bulkUpsert(groups, savepoint));
      return rejected;
    } catch (error) {
      if (!isRowScoped(error)) throw error;
    }

    for (const group of groups) {
      try {
        await this.sequelize.transaction({ transaction }, (savepoint) => this.bulkUpsert([group], savepoint));
      } catch (error) {
        if (!isRowScoped(error)) throw error;
        rejected.set(group.sku, failureReason(error));
      }
    }
    return rejected;
  }

  /** One statement per set of carried columns, so an update never touches a column the file lacks. */
  private async bulkUpsert(groups: readonly SkuGroup[], transaction: Transaction): Promise<void> {
    const byColumns = new Map<string, SkuGroup[]>();
    for (const group of groups) {
      const key = presentOptionalFields([group.record]).join(',');
      const bucket = byColumns.get(key);
      if (bucket) bucket.push(group);
      else byColumns.set(key, [group]);
    }

    for (const sameColumns of byColumns.values()) {
      const fields = presentOptionalFields(sameColumns.map((group) => group.record));
      const updateOnDuplicate: (keyof ProductRow)[] = ['name', ...fields, 'updatedAt'];
      await this.Product.bulkCreate(
        sameColumns.map((group) => ProductMapper.toCreationRow(group.record)),
        { transaction, updateOnDuplicate, conflictAttributes: ['sku'] },
      );
    }
  }
}
