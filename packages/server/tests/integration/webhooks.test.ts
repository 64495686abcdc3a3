import { describe, it, expect, afterEach } from 'vitest';
import { createTestApp } from '../helpers/testApp.js';

type TestApp = Awaited<ReturnType<typeof createTestApp>>;

const HOOK = { name: 'erp', url: 'http://hooks.test/erp', eventType: 'import.completed' } as const;

let ctx: TestApp | undefined;

async function setup(options?: Parameters<typeof createTestApp>[0]): Promise<TestApp> {
  ctx = await createTestApp(options);
  return ctx;
}

afterEach(async () => {
  await ctx?.close();
  ctx = undefined;
});

describe('GET /api/webhooks/events/types', () => {
  it('should list the six event types with their labels', async () => {
    const { app } = await setup();

    const response = await app.inject({ method: 'GET', url: '/api/webhooks/events/types' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      event_types: [
        { value: 'product.created', label: 'Product Created' },
        { value: 'product.updated', label: 'Product Updated' },
        { value: 'product.deleted', label: 'Product Deleted' },
        { value: 'import.started', label: 'Import Started' },
        { value: 'import.completed', label: 'Import Completed' },
        { value: 'import.failed', label: 'Import Failed' },
      ],
    });
  });
});

describe('POST /api/webhooks/:id/test', () => {
  it('should report a successful round trip', async () => {
    const { app, outbound, webhookStore } = await setup({ webhooks: [HOOK] });

    const response = await app.inject({ method: 'POST', url: '/api/webhooks/1/test' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      success: true,
      status_code: 200,
      response_time_ms: expect.any(Number),
      error: null,
    });
    expect(outbound).toEqual(['http://hooks.test/erp']);
    expect((await webhookStore.get(1))?.lastResponseCode).toBe(200);
  });

  it('should report an error response and count the failure', async () => {
    const { app, webhookStore } = await setup({
      webhooks: [HOOK],
      respond: () => new Response(null, { status: 500 }),
    });

    const response = await app.inject({ method: 'POST', url: '/api/webhooks/1/test' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ success: false, status_code: 500, error: 'HTTP 500' });
    expect((await webhookStore.get(1))?.failureCount).toBe(1);
  });

  it('should answer 404 for an unknown webhook', async () => {
    const { app } = await setup();

    const response = await app.inject({ method: 'POST', url: '/api/webhooks/42/test' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ detail: 'Webhook not found: 42' });
  });

  it('should answer 400 for an id that is not a number', async () => {
    const { app, outbound } = await setup({ webhooks: [HOOK] });

    const response = await app.inject({ method: 'POST', url: '/api/webhooks/abc/test' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ detail: 'id: Expected number, received nan' });
    expect(outbound).toEqual([]);
  });
});

describe('GET /health', () => {
  it('should report the service as healthy with its version', async () => {
    const { app } = await setup();

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'healthy', version: '9.9.9-test' });
  });
});
