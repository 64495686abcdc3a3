import type { RowError } from './RowError.js';

/** Counters produced by applying one batch. */
export interface BatchOutcome {
  readonly batchIndex: number;
  /** Rows consumed from the source, valid or not. */
  readonly rows: number;
  readonly created: number;
  readonly updated: number;
  readonly failedRows: number;
  /** Row errors in source order. */
  readonly errors: readonly RowError[];
}
