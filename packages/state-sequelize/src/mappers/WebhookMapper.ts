import type { Webhook } from '@product-importer/core';
import { isWebhookEventType } from '@product-importer/core';
import type { WebhookRow } from '../models/WebhookModel.js';

export function toDomain(row: WebhookRow): Webhook {
  if (!isWebhookEventType(row.eventType)) {
    throw new Error(`Unknown webhook event type "${row.eventType}" for webhook ${String(row.id)}`);
  }

  return {
    id: row.id,
    name: row.name,
    url: row.url,
    eventType: row.eventType,
    isEnabled: Boolean(row.isEnabled),
    secret: row.secret,
    lastTriggeredAt: row.lastTriggeredAt === null ? null : new Date(row.lastTriggeredAt).getTime(),
    lastResponseCode: row.lastResponseCode,
    lastResponseTimeMs: row.lastResponseTimeMs,
    failureCount: row.failureCount,
  };
}
