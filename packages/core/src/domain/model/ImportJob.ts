import { ImportStatus } from './ImportStatus.js';
import type { RowError } from './RowError.js';

/**
 * Snapshot of an import job. Snapshots are immutable: every change produces
 * a new object which is persisted before anyone else observes it.
 *
 * Timestamps are epoch milliseconds.
 */
export interface ImportJob {
  readonly id: string;
  readonly filename: string;
  readonly status: ImportStatus;
  /** Data rows in the source, or `null` while unknown. */
  readonly totalRows: number | null;
  readonly processedRows: number;
  readonly createdCount: number;
  readonly updatedCount: number;
  /** Rows that could not be applied. */
  readonly errorCount: number;
  /** 0-100, two decimals. */
  readonly progressPercentage: number;
  readonly message: string;
  /** Set once the job fails. */
  readonly error: string | null;
  /** Bounded sample of row errors, in the order they were found. */
  readonly errorDetails: readonly RowError[];
  readonly createdAt: number;
  readonly startedAt: number | null;
  readonly completedAt: number | null;
}

export function createImportJob(id: string, filename: string, now: number = Date.now()): ImportJob {
  return {
    id,
    filename,
    status: ImportStatus.PENDING,
    totalRows: null,
    processedRows: 0,
    createdCount: 0,
    updatedCount: 0,
    errorCount: 0,
    progressPercentage: 0,
    message: 'Waiting to start',
    error: null,
    errorDetails: [],
    createdAt: now,
    startedAt: null,
    completedAt: null,
  };
}

/** `processed / total * 100` rounded to two decimals; `0` while the total is unknown or zero. */
export function computeProgressPercentage(processedRows: number, totalRows: number | null): number {
  if (totalRows === null || totalRows <= 0) return 0;
  const ratio = Math.min(processedRows / totalRows, 1);
  return Math.round(ratio * 10000) / 100;
}
