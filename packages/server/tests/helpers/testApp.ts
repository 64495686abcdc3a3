import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  ImportEngine,
  InMemoryProductStore,
  InMemoryWebhookStore,
  ProgressPublisher,
  createLogger,
} from '@product-importer/core';
import type { WebhookDefinition } from '@product-importer/core';
import { CsvProductParser } from '@product-importer/csv';
import { WebhookDispatcher } from '@product-importer/webhooks';
import type { FetchLike } from '@product-importer/webhooks';
import { buildApp } from '../../src/app.js';

export interface TestAppOptions {
  readonly webhooks?: readonly WebhookDefinition[];
  /** Answer for every outbound webhook request. Default: 200. */
  readonly respond?: (url: string) => Response;
  readonly maxUploadSize?: number;
  readonly streamMaxDurationMs?: number;
}

/** The API over in-memory stores, a fake `fetch` and a throwaway upload directory. */
export async function createTestApp(options: TestAppOptions = {}) {
  const uploadDir = await mkdtemp(path.join(os.tmpdir(), 'product-importer-uploads-'));
  const logger = createLogger({ level: 'silent' });
  const publisher = new ProgressPublisher();
  const productStore = new InMemoryProductStore();
  const engine = new ImportEngine({ parser: new CsvProductParser(), productStore, publisher, batchSize: 2, logger });

  const webhookStore = new InMemoryWebhookStore(options.webhooks ?? []);
  const outbound: string[] = [];
  const fetch: FetchLike = async (url) => {
    outbound.push(url);
    return options.respond?.(url) ?? new Response(null, { status: 200 });
  };
  const dispatcher = new WebhookDispatcher({ store: webhookStore, fetch, logger });

  const app = await buildApp({
    engine,
    dispatcher,
    logger,
    version: '9.9.9-test',
    uploadDir,
    maxUploadSize: options.maxUploadSize ?? 1024 * 1024,
    streamMaxDurationMs: options.streamMaxDurationMs ?? 5000,
    streamKeepAliveMs: 1000,
  });

  return {
    app,
    engine,
    publisher,
    productStore,
    webhookStore,
    uploadDir,
    outbound,
    async close() {
      await app.close();
      await rm(uploadDir, { recursive: true, force: true });
    },
  };
}

/** A `multipart/form-data` request carrying one file field named `file`. */
export function fileUpload(filename: string, content: string) {
  const boundary = '----product-importer-test';
  return {
    headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
    payload: [
      `--${boundary}`,
      `Content-Disposition: form-data; name="file"; filename="${filename}"`,
      'Content-Type: text/csv',
      '',
      content,
      `--${boundary}--`,
      '',
    ].join('\r\n'),
  };
}

/** The JSON payloads of the `data:` lines of an event-stream body. */
export function sseEvents(body: string): unknown[] {
  return body
    .split('\n')
    .filter((line) => line.startsWith('data: '))
    .map((line): unknown => JSON.parse(line.slice('data: '.length)));
}
