import { describe, it, expect } from 'vitest';
import type { ParsedRow } from '@product-importer/core';
import { CsvProductParser } from '../../src/infrastructure/parsers/CsvProductParser.js';
import { MissingColumnsError } from '../../src/domain/errors.js';

async function* chunksOf(...parts: string[]): AsyncIterable<string> {
  for (const part of parts) yield await Promise.resolve(part);
}

async function* failingAfter(first: string, error: Error): AsyncIterable<string> {
  yield first;
  await new Promise((resolve) => setTimeout(resolve, 10));
  throw error;
}

async function collect(rows: AsyncIterable<ParsedRow>): Promise<ParsedRow[]> {
  const result: ParsedRow[] = [];
  for await (const row of rows) result.push(row);
  return result;
}

describe('CsvProductParser', () => {
  const parser = new CsvProductParser({ delimiter: ',' });

  it('should read and normalize the header on open', async () => {
    const { columns } = await parser.open(chunksOf('\uFEFFSKU , Name,Price\n', 'a,b,1\n'));

    expect(columns).toEqual(['sku', 'name', 'price']);
  });

  it('should number rows from 2 and skip blank lines', async () => {
    const { rows } = await parser.open(chunksOf('sku,name\nA,Alpha\n\n\nB,Beta\n'));

    const parsed = await collect(rows);

    expect(parsed).toEqual([
      { ok: true, rowIndex: 2, record: { sku: 'A', name: 'Alpha' } },
      { ok: true, rowIndex: 3, record: { sku: 'B', name: 'Beta' } },
    ]);
  });

  it('should report a row of empty cells instead of skipping it', async () => {
    const { rows } = await parser.open(chunksOf('sku,name,price\nA,Alpha,1\n,,\nB,Beta,2\n'));

    const parsed = await collect(rows);

    expect(parsed).toEqual([
      { ok: true, rowIndex: 2, record: { sku: 'A', name: 'Alpha', price: 1 } },
      {
        ok: false,
        rowIndex: 3,
        errors: [
          { rowIndex: 3, field: 'sku', reason: 'SKU is required' },
          { rowIndex: 3, field: 'name', reason: 'Name is required' },
        ],
      },
      { ok: true, rowIndex: 4, record: { sku: 'B', name: 'Beta', price: 2 } },
    ]);
  });

  it('should report a whitespace-only line as a short row', async () => {
    const { rows } = await parser.open(chunksOf('sku,name\nA,Alpha\n   \nB,Beta\n'));

    const parsed = await collect(rows);

    expect(parsed[1]).toEqual({
      ok: false,
      rowIndex: 3,
      errors: [{ rowIndex: 3, field: 'row', reason: 'Expected 2 columns but found 1' }],
    });
    expect(parsed).toHaveLength(3);
  });

  it('should handle quoted fields and rows split across chunks', async () => {
    const { rows } = await parser.open(
      chunksOf('sku,name,description\n"a-1","Widget","One, two"\na-2,Gad', 'get,"Multi\nline"\n'),
    );

    const parsed = await collect(rows);

    expect(parsed).toEqual([
      { ok: true, rowIndex: 2, record: { sku: 'A-1', name: 'Widget', description: 'One, two' } },
      { ok: true, rowIndex: 3, record: { sku: 'A-2', name: 'Gadget', description: 'Multi\nline' } },
    ]);
  });

  it('should report rows with the wrong number of cells', async () => {
    const { rows } = await parser.open(chunksOf('sku,name,price\nA,Alpha\n'));

    expect(await collect(rows)).toEqual([
      {
        ok: false,
        rowIndex: 2,
        errors: [{ rowIndex: 2, field: 'row', reason: 'Expected 3 columns but found 2' }],
      },
    ]);
  });

  it('should reject a file without the required columns', async () => {
    await expect(parser.open(chunksOf('sku,price\nA,1\n'))).rejects.toThrow(MissingColumnsError);
    await expect(parser.open(chunksOf('sku,price\nA,1\n'))).rejects.toThrow('Missing required column(s): name');
  });

  it('should reject an empty file', async () => {
    await expect(parser.open(chunksOf(''))).rejects.toThrow('Missing required column(s): sku, name');
  });

  it('should let the consumer stop early', async () => {
    const { rows } = await parser.open(chunksOf('sku,name\nA,Alpha\nB,Beta\nC,Gamma\n'));

    const seen: number[] = [];
    for await (const row of rows) {
      seen.push(row.rowIndex);
      break;
    }

    expect(seen).toEqual([2]);
  });

  it('should surface a source failure while reading rows', async () => {
    const { rows } = await parser.open(failingAfter('sku,name\nA,Alpha\n', new Error('disk gone')));

    await expect(collect(rows)).rejects.toThrow('disk gone');
  });
});
