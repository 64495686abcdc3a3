import type { ImportJob } from './model/ImportJob.js';
import type { ImportStatus } from './model/ImportStatus.js';
import type { Product } from './model/ProductRecord.js';

/** Wire form of a job snapshot, as served to HTTP clients and webhook receivers. */
export interface ImportJobView {
  readonly id: string;
  readonly filename: string;
  readonly status: ImportStatus;
  readonly total_rows: number | null;
  readonly processed_rows: number;
  readonly created_count: number;
  readonly updated_count: number;
  readonly error_count: number;
  readonly progress_percentage: number;
  readonly message: string;
  readonly error: string | null;
  readonly error_details: ReadonlyArray<{ readonly row: number; readonly field: string; readonly reason: string }>;
  readonly created_at: string;
  readonly started_at: string | null;
  readonly completed_at: string | null;
}

export interface ProductView {
  readonly id: number;
  readonly sku: string;
  readonly name: string;
  readonly description: string | null;
  readonly price: number | null;
  readonly quantity: number;
  readonly is_active: boolean;
  readonly created_at: string;
  readonly updated_at: string;
}

function isoOrNull(epochMs: number | null): string | null {
  return epochMs === null ? null : new Date(epochMs).toISOString();
}

export function toImportJobView(job: ImportJob): ImportJobView {
  return {
    id: job.id,
    filename: job.filename,
    status: job.status,
    total_rows: job.totalRows,
    processed_rows: job.processedRows,
    created_count: job.createdCount,
    updated_count: job.updatedCount,
    error_count: job.errorCount,
    progress_percentage: job.progressPercentage,
    message: job.message,
    error: job.error,
    error_details: job.errorDetails.map((e) => ({ row: e.rowIndex, field: e.field, reason: e.reason })),
    created_at: new Date(job.createdAt).toISOString(),
    started_at: isoOrNull(job.startedAt),
    completed_at: isoOrNull(job.completedAt),
  };
}

export function toProductView(product: Product): ProductView {
  return {
    id: product.id,
    sku: product.sku,
    name: product.name,
    description: product.description,
    price: product.price,
    quantity: product.quantity,
    is_active: product.isActive,
    created_at: new Date(product.createdAt).toISOString(),
    updated_at: new Date(product.updatedAt).toISOString(),
  };
}
