import type { Product, ProductRecord } from '@product-importer/core';
import { PRODUCT_DEFAULTS, normalizeSku } from '@product-importer/core';
import type { ProductCreationRow, ProductRow } from '../models/ProductModel.js';

/** Insert values: fields the record does not carry take their defaults. */
export function toCreationRow(record: ProductRecord): ProductCreationRow {
  return {
    sku: normalizeSku(record.sku),
    name: record.name,
    description: record.description !== undefined ? record.description : PRODUCT_DEFAULTS.description,
    price: record.price !== undefined ? record.price : PRODUCT_DEFAULTS.price,
    quantity: record.quantity ?? PRODUCT_DEFAULTS.quantity,
    isActive: record.isActive ?? PRODUCT_DEFAULTS.isActive,
  };
}

export function toDomain(row: ProductRow): Product {
  return {
    id: row.id,
    sku: row.sku,
    name: row.name,
    description: row.description,
    price: row.price === null ? null : Number(row.price),
    quantity: row.quantity,
    isActive: Boolean(row.isActive),
    createdAt: new Date(row.createdAt).getTime(),
    updatedAt: new Date(row.updatedAt).getTime(),
  };
}
