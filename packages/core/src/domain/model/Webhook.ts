/** Lifecycle events an endpoint can subscribe to. */
export const WebhookEventType = {
  PRODUCT_CREATED: 'product.created',
  PRODUCT_UPDATED: 'product.updated',
  PRODUCT_DELETED: 'product.deleted',
  IMPORT_STARTED: 'import.started',
  IMPORT_COMPLETED: 'import.completed',
  IMPORT_FAILED: 'import.failed',
} as const;

export type WebhookEventType = (typeof WebhookEventType)[keyof typeof WebhookEventType];

export const WEBHOOK_EVENT_LABELS: Record<WebhookEventType, string> = {
  [WebhookEventType.PRODUCT_CREATED]: 'Product Created',
  [WebhookEventType.PRODUCT_UPDATED]: 'Product Updated',
  [WebhookEventType.PRODUCT_DELETED]: 'Product Deleted',
  [WebhookEventType.IMPORT_STARTED]: 'Import Started',
  [WebhookEventType.IMPORT_COMPLETED]: 'Import Completed',
  [WebhookEventType.IMPORT_FAILED]: 'Import Failed',
};

export const WEBHOOK_EVENT_TYPES: readonly WebhookEventType[] = Object.values(WebhookEventType);

export function isWebhookEventType(value: unknown): value is WebhookEventType {
  return typeof value === 'string' && WEBHOOK_EVENT_TYPES.some((type) => type === value);
}

/** A subscribed HTTP endpoint together with its last delivery outcome. */
export interface Webhook {
  readonly id: number;
  readonly name: string;
  readonly url: string;
  readonly eventType: WebhookEventType;
  readonly isEnabled: boolean;
  /** Shared secret for the `X-Webhook-Signature` header. No signature is sent without one. */
  readonly secret: string | null;
  readonly lastTriggeredAt: number | null;
  readonly lastResponseCode: number | null;
  readonly lastResponseTimeMs: number | null;
  /** Consecutive failed deliveries; reset by a success. */
  readonly failureCount: number;
}

export interface DeliveryOutcome {
  readonly triggeredAt: number;
  /** `null` when no response arrived (network error, timeout). */
  readonly responseCode: number | null;
  readonly responseTimeMs: number;
  readonly success: boolean;
}
