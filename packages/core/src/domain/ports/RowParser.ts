import type { ParsedRow } from '../model/ProductRecord.js';

export interface ParsedRowStream {
  /** Normalized header columns, in file order. */
  readonly columns: readonly string[];
  /** Data rows in source order. Blank lines are skipped. */
  readonly rows: AsyncIterable<ParsedRow>;
}

/**
 * Port for turning decoded text into product rows.
 *
 * `open` reads the header and rejects a file that lacks a required column
 * before any row is produced. Row-level problems never reject: they come out
 * as `{ ok: false }` rows.
 */
export interface RowParser {
  open(chunks: AsyncIterable<string>): Promise<ParsedRowStream>;
}
