import type { WebhookStore } from '../../domain/ports/WebhookStore.js';
import type { DeliveryOutcome, Webhook, WebhookEventType } from '../../domain/model/Webhook.js';

export type WebhookDefinition = Pick<Webhook, 'name' | 'url' | 'eventType'> &
  Partial<Pick<Webhook, 'isEnabled' | 'secret'>>;

/** Non-persistent webhook store. */
export class InMemoryWebhookStore implements WebhookStore {
  private readonly webhooks = new Map<number, Webhook>();
  private nextId = 1;

  constructor(definitions: readonly WebhookDefinition[] = []) {
    for (const definition of definitions) this.add(definition);
  }

  add(definition: WebhookDefinition): Webhook {
    const webhook: Webhook = {
      id: this.nextId++,
      name: definition.name,
      url: definition.url,
      eventType: definition.eventType,
      isEnabled: definition.isEnabled ?? true,
      secret: definition.secret ?? null,
      lastTriggeredAt: null,
      lastResponseCode: null,
      lastResponseTimeMs: null,
      failureCount: 0,
    };
    this.webhooks.set(webhook.id, webhook);
    return webhook;
  }

  findEnabledByEvent(eventType: WebhookEventType): Promise<readonly Webhook[]> {
    return Promise.resolve([...this.webhooks.values()].filter((w) => w.isEnabled && w.eventType === eventType));
  }

  get(webhookId: number): Promise<Webhook | null> {
    return Promise.resolve(this.webhooks.get(webhookId) ?? null);
  }

  recordDelivery(webhookId: number, outcome: DeliveryOutcome): Promise<void> {
    const webhook = this.webhooks.get(webhookId);
    if (webhook) {
      this.webhooks.set(webhookId, {
        ...webhook,
        lastTriggeredAt: outcome.triggeredAt,
        lastResponseCode: outcome.responseCode,
        lastResponseTimeMs: outcome.responseTimeMs,
        failureCount: outcome.success ? 0 : webhook.failureCount + 1,
      });
    }
    return Promise.resolve();
  }
}
