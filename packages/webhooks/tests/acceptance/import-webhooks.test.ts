import { describe, it, expect } from 'vitest';
import { BufferSource, ImportEngine, InMemoryProductStore, InMemoryWebhookStore } from '@product-importer/core';
import type { ParsedRow, RowParser, WebhookDefinition } from '@product-importer/core';
import { WebhookDispatcher } from '../../src/application/WebhookDispatcher.js';
import { bindImportWebhooks } from '../../src/application/bindImportWebhooks.js';
import { fakeFetch, status } from '../helpers/fakeFetch.js';

// --- Helpers ---

/** `sku,name` lines; a file whose header is not `sku,name` is rejected. */
const lineParser: RowParser = {
  async open(chunks) {
    let text = '';
    for await (const chunk of chunks) text += chunk;
    const [header = '', ...lines] = text.split('\n').filter((line) => line.length > 0);
    if (header !== 'sku,name') throw new Error('Missing required column(s): name');

    async function* rows(): AsyncIterable<ParsedRow> {
      for (const [i, line] of lines.entries()) {
        const [sku = '', name = ''] = line.split(',');
        yield { ok: true, rowIndex: i + 2, record: { sku: sku.toUpperCase(), name } };
      }
    }
    return { columns: ['sku', 'name'], rows: rows() };
  },
};

const HOOKS: readonly WebhookDefinition[] = [
  { name: 'started', url: 'http://hooks.test/started', eventType: 'import.started' },
  { name: 'completed', url: 'http://hooks.test/completed', eventType: 'import.completed' },
  { name: 'failed', url: 'http://hooks.test/failed', eventType: 'import.failed' },
  { name: 'muted', url: 'http://hooks.test/muted', eventType: 'import.completed', isEnabled: false },
  { name: 'products', url: 'http://hooks.test/products', eventType: 'product.created' },
];

function setup() {
  const { fetch, requests } = fakeFetch(() => status(200));
  const dispatcher = new WebhookDispatcher({ store: new InMemoryWebhookStore(HOOKS), fetch });
  const engine = new ImportEngine({ parser: lineParser, productStore: new InMemoryProductStore() });
  const unbind = bindImportWebhooks(engine, dispatcher);
  return { engine, dispatcher, requests, unbind };
}

// ============================================================
// Import lifecycle webhooks
// ============================================================

describe('Import lifecycle webhooks', () => {
  it('should announce the start and the completion of an import', async () => {
    const { engine, dispatcher, requests } = setup();

    const job = await engine.import('products.csv', new BufferSource('sku,name\na,Alpha\nb,Beta\n'));
    await engine.whenIdle();
    await dispatcher.drain();

    expect(requests.map((r) => r.url)).toEqual(['http://hooks.test/started', 'http://hooks.test/completed']);
    expect(JSON.parse(requests[1]?.body ?? '')).toMatchObject({
      event: 'import.completed',
      data: { job_id: job.id, status: 'completed', processed_rows: 2, created_count: 2, error_count: 0 },
    });
  });

  it('should announce a failed import with its error', async () => {
    const { engine, dispatcher, requests } = setup();

    await engine.import('products.csv', new BufferSource('sku,price\na,1\n'));
    await engine.whenIdle();
    await dispatcher.drain();

    expect(requests.map((r) => r.url)).toEqual(['http://hooks.test/started', 'http://hooks.test/failed']);
    expect(JSON.parse(requests[1]?.body ?? '')).toMatchObject({
      event: 'import.failed',
      data: { status: 'failed', error: 'Missing required column(s): name' },
    });
  });

  it('should stop forwarding once unbound', async () => {
    const { engine, dispatcher, requests, unbind } = setup();

    unbind();
    await engine.import('products.csv', new BufferSource('sku,name\na,Alpha\n'));
    await engine.whenIdle();
    await dispatcher.drain();

    expect(requests).toHaveLength(0);
  });
});
