import type { ImportJob, ImportStatus, Product, ProductView } from '@product-importer/core';
import { WebhookEventType, toProductView } from '@product-importer/core';

export interface ImportEventData {
  readonly job_id: string;
  readonly filename: string;
  readonly status: ImportStatus;
  readonly total_rows: number | null;
  readonly processed_rows: number;
  readonly created_count: number;
  readonly updated_count: number;
  readonly error_count: number;
  readonly error: string | null;
}

export interface ProductDeletedData {
  readonly id: number;
  readonly sku: string;
}

export type WebhookEvent =
  | { readonly type: typeof WebhookEventType.IMPORT_STARTED; readonly data: ImportEventData }
  | { readonly type: typeof WebhookEventType.IMPORT_COMPLETED; readonly data: ImportEventData }
  | { readonly type: typeof WebhookEventType.IMPORT_FAILED; readonly data: ImportEventData }
  | { readonly type: typeof WebhookEventType.PRODUCT_CREATED; readonly data: ProductView }
  | { readonly type: typeof WebhookEventType.PRODUCT_UPDATED; readonly data: ProductView }
  | { readonly type: typeof WebhookEventType.PRODUCT_DELETED; readonly data: ProductDeletedData };

/** JSON body posted to every receiver. */
export interface WebhookPayload {
  readonly event: string;
  readonly data: unknown;
  readonly timestamp: string;
}

function importData(job: ImportJob): ImportEventData {
  return {
    job_id: job.id,
    filename: job.filename,
    status: job.status,
    total_rows: job.totalRows,
    processed_rows: job.processedRows,
    created_count: job.createdCount,
    updated_count: job.updatedCount,
    error_count: job.errorCount,
    error: job.error,
  };
}

export function importStarted(job: ImportJob): WebhookEvent {
  return { type: WebhookEventType.IMPORT_STARTED, data: importData(job) };
}

export function importCompleted(job: ImportJob): WebhookEvent {
  return { type: WebhookEventType.IMPORT_COMPLETED, data: importData(job) };
}

export function importFailed(job: ImportJob): WebhookEvent {
  return { type: WebhookEventType.IMPORT_FAILED, data: importData(job) };
}

export function productCreated(product: Product): WebhookEvent {
  return { type: WebhookEventType.PRODUCT_CREATED, data: toProductView(product) };
}

export function productUpdated(product: Product): WebhookEvent {
  return { type: WebhookEventType.PRODUCT_UPDATED, data: toProductView(product) };
}

export function productDeleted(product: Pick<Product, 'id' | 'sku'>): WebhookEvent {
  return { type: WebhookEventType.PRODUCT_DELETED, data: { id: product.id, sku: product.sku } };
}

export function buildPayload(event: WebhookEvent, timestamp: number): WebhookPayload {
  return { event: event.type, data: event.data, timestamp: new Date(timestamp).toISOString() };
}
