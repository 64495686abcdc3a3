import type { ImportJob, RowError } from '@product-importer/core';
import { isImportStatus } from '@product-importer/core';
import type { ImportJobRow } from '../models/ImportJobModel.js';
import { parseJson } from '../utils/parseJson.js';

function toEpoch(value: number | string | null): number | null {
  return value === null ? null : Number(value);
}

function isRowError(value: unknown): value is RowError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'rowIndex' in value &&
    typeof value.rowIndex === 'number' &&
    'field' in value &&
    typeof value.field === 'string' &&
    'reason' in value &&
    typeof value.reason === 'string'
  );
}

function toRowErrors(value: unknown): RowError[] {
  const parsed = parseJson(value);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter(isRowError).map((e) => ({ rowIndex: e.rowIndex, field: e.field, reason: e.reason }));
}

export function toRow(job: ImportJob): ImportJobRow {
  return {
    id: job.id,
    filename: job.filename,
    status: job.status,
    totalRows: job.totalRows,
    processedRows: job.processedRows,
    createdCount: job.createdCount,
    updatedCount: job.updatedCount,
    errorCount: job.errorCount,
    progressPercentage: job.progressPercentage,
    message: job.message,
    error: job.error,
    errorDetails: job.errorDetails.map((e) => ({ rowIndex: e.rowIndex, field: e.field, reason: e.reason })),
    createdAt: job.createdAt,
    startedAt: job.startedAt,
    completedAt: job.completedAt,
  };
}

export function toDomain(row: ImportJobRow): ImportJob {
  if (!isImportStatus(row.status)) {
    throw new Error(`Unknown import status "${row.status}" for job ${row.id}`);
  }

  return {
    id: row.id,
    filename: row.filename,
    status: row.status,
    totalRows: row.totalRows,
    processedRows: row.processedRows,
    createdCount: row.createdCount,
    updatedCount: row.updatedCount,
    errorCount: row.errorCount,
    progressPercentage: Number(row.progressPercentage),
    message: row.message,
    error: row.error,
    errorDetails: toRowErrors(row.errorDetails),
    createdAt: Number(row.createdAt),
    startedAt: toEpoch(row.startedAt),
    completedAt: toEpoch(row.completedAt),
  };
}
