/**
 * A problem attributed to one data row.
 *
 * `rowIndex` is the 1-based line of the source as a spreadsheet user would
 * count it: the header is row 1, so the first data row is row 2.
 */
export interface RowError {
  readonly rowIndex: number;
  /** Column the problem was found in, or `row` when it concerns the whole row. */
  readonly field: string;
  readonly reason: string;
}

export function rowError(rowIndex: number, field: string, reason: string): RowError {
  return { rowIndex, field, reason };
}

/** Number of distinct rows represented by a list of errors. */
export function countFailedRows(errors: readonly RowError[]): number {
  return new Set(errors.map((e) => e.rowIndex)).size;
}
