import type { ParsedRow, ProductRecord } from '../../src/domain/model/ProductRecord.js';
import type { RowParser } from '../../src/domain/ports/RowParser.js';

/**
 * Minimal comma-separated parser for engine tests: no quoting, header row
 * required, `sku` and `name` mandatory, optional numeric `price`.
 */
export function simpleRowParser(): RowParser {
  return {
    async open(chunks) {
      let text = '';
      for await (const chunk of chunks) text += chunk;

      const lines = text.split('\n').filter((l) => l.trim() !== '');
      const columns = (lines[0] ?? '').split(',').map((h) => h.trim().toLowerCase());
      const missing = ['sku', 'name'].filter((c) => !columns.includes(c));
      if (missing.length > 0) {
        throw new Error(`Missing required column(s): ${missing.join(', ')}`);
      }

      async function* rows(): AsyncIterable<ParsedRow> {
        for (let i = 1; i < lines.length; i++) {
          const rowIndex = i + 1;
          const cells = (lines[i] ?? '').split(',').map((v) => v.trim());
          const cell = (name: string): string => cells[columns.indexOf(name)] ?? '';

          const sku = cell('sku');
          const name = cell('name');
          if (!sku || !name) {
            const field = sku ? 'name' : 'sku';
            yield { ok: false, rowIndex, errors: [{ rowIndex, field, reason: `${field} is required` }] };
            continue;
          }

          let record: ProductRecord = { sku: sku.toUpperCase(), name };
          if (columns.includes('price')) {
            const raw = cell('price');
            const price = Number(raw);
            if (raw !== '' && Number.isNaN(price)) {
              yield { ok: false, rowIndex, errors: [{ rowIndex, field: 'price', reason: `Invalid price format: ${raw}` }] };
              continue;
            }
            record = { ...record, price: raw === '' ? null : price };
          }
          await Promise.resolve();
          yield { ok: true, rowIndex, record };
        }
      }

      return { columns, rows: rows() };
    },
  };
}

/** `sku,name,price` CSV with `count` valid rows, SKUs `SKU-0001`... */
export function productCsv(count: number, start = 1): string {
  const lines = ['sku,name,price'];
  for (let i = start; i < start + count; i++) {
    lines.push(`sku-${String(i).padStart(4, '0')},Product ${String(i)},${String(i)}.50`);
  }
  return lines.join('\n') + '\n';
}
