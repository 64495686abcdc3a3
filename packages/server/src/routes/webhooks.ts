import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { WEBHOOK_EVENT_LABELS, WEBHOOK_EVENT_TYPES } from '@product-importer/core';
import type { WebhookDispatcher } from '@product-importer/webhooks';
import { parseRequest } from './validation.js';

export interface WebhookRoutesOptions {
  readonly dispatcher: WebhookDispatcher;
}

const WebhookParams = z.object({ id: z.coerce.number().int().positive() });

export const webhookRoutes: FastifyPluginAsync<WebhookRoutesOptions> = async (app, { dispatcher }) => {
  app.get('/events/types', async () => ({
    event_types: WEBHOOK_EVENT_TYPES.map((value) => ({ value, label: WEBHOOK_EVENT_LABELS[value] })),
  }));

  app.post('/:id/test', async (request) => {
    const { id } = parseRequest(WebhookParams, request.params);
    const result = await dispatcher.test(id);
    return {
      success: result.success,
      status_code: result.statusCode,
      response_time_ms: result.responseTimeMs,
      error: result.error,
    };
  });
};
