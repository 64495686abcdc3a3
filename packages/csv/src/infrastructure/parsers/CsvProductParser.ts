import Papa from 'papaparse';
import { Readable, pipeline } from 'node:stream';
import type { ParsedRow, ParsedRowStream, RowParser } from '@product-importer/core';
import { ProductRowMapper } from '../../domain/services/ProductRowMapper.js';

export interface CsvProductParserOptions {
  /** Field delimiter. Default: detected by PapaParse from the first chunk. */
  readonly delimiter?: string;
}

function toCells(row: unknown): string[] {
  return Array.isArray(row) ? row.map((cell) => (typeof cell === 'string' ? cell : String(cell))) : [];
}

async function readHeader(iterator: AsyncIterator<unknown>): Promise<ProductRowMapper> {
  const header = await iterator.next();
  return new ProductRowMapper(header.done ? [] : toCells(header.value));
}

/**
 * Streaming product CSV parser built on PapaParse's Node stream input.
 *
 * Text chunks are piped through the parser and rows are pulled one at a
 * time, so memory stays bounded by the batch the consumer holds. The header
 * is read as soon as the file is opened.
 */
export class CsvProductParser implements RowParser {
  constructor(private readonly options: CsvProductParserOptions = {}) {}

  async open(chunks: AsyncIterable<string>): Promise<ParsedRowStream> {
    const csv = Papa.parse(Papa.NODE_STREAM_INPUT, {
      header: false,
      skipEmptyLines: true,
      delimiter: this.options.delimiter,
    });
    // A failing source destroys `csv` with the error, which the row iterator then rethrows.
    pipeline(Readable.from(chunks), csv, () => undefined);

    const iterator = csv[Symbol.asyncIterator]();

    const mapper = await readHeader(iterator).catch((error: unknown) => {
      csv.destroy();
      throw error;
    });

    async function* rows(): AsyncIterable<ParsedRow> {
      let rowIndex = 1;
      try {
        for (;;) {
          const next = await iterator.next();
          if (next.done) return;
          rowIndex++;
          yield mapper.map(toCells(next.value), rowIndex);
        }
      } finally {
        csv.destroy();
      }
    }

    return { columns: mapper.columns, rows: rows() };
  }
}
