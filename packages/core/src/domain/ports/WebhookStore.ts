import type { DeliveryOutcome, Webhook, WebhookEventType } from '../model/Webhook.js';

/** Read access to webhook configuration plus delivery bookkeeping. */
export interface WebhookStore {
  findEnabledByEvent(eventType: WebhookEventType): Promise<readonly Webhook[]>;
  get(webhookId: number): Promise<Webhook | null>;
  /** Store the outcome; a failure increments `failureCount`, a success resets it. */
  recordDelivery(webhookId: number, outcome: DeliveryOutcome): Promise<void>;
}
