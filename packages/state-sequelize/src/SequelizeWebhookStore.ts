import { literal } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type {
  DeliveryOutcome,
  Webhook,
  WebhookDefinition,
  WebhookEventType,
  WebhookStore,
} from '@product-importer/core';
import { defineWebhookModel } from './models/WebhookModel.js';
import type { WebhookModel } from './models/WebhookModel.js';
import * as WebhookMapper from './mappers/WebhookMapper.js';

/**
 * Webhook configuration in the `webhooks` table.
 *
 * Rows are managed elsewhere; this store reads them and keeps the delivery
 * columns current. `register` exists for seeding and tests.
 */
export class SequelizeWebhookStore implements WebhookStore {
  private readonly Webhook: WebhookModel;

  constructor(sequelize: Sequelize) {
    this.Webhook = defineWebhookModel(sequelize);
  }

  async initialize(): Promise<void> {
    await this.Webhook.sync();
  }

  async register(definition: WebhookDefinition): Promise<Webhook> {
    const row = await this.Webhook.create({
      name: definition.name,
      url: definition.url,
      eventType: definition.eventType,
      isEnabled: definition.isEnabled ?? true,
      secret: definition.secret ?? null,
    });
    return WebhookMapper.toDomain(row.get({ plain: true }));
  }

  async findEnabledByEvent(eventType: WebhookEventType): Promise<readonly Webhook[]> {
    const rows = await this.Webhook.findAll({
      where: { eventType, isEnabled: true },
      order: [['id', 'ASC']],
    });
    return rows.map((row) => WebhookMapper.toDomain(row.get({ plain: true })));
  }

  async get(webhookId: number): Promise<Webhook | null> {
    const row = await this.Webhook.findByPk(webhookId);
    return row ? WebhookMapper.toDomain(row.get({ plain: true })) : null;
  }

  async recordDelivery(webhookId: number, outcome: DeliveryOutcome): Promise<void> {
    await this.Webhook.update(
      {
        lastTriggeredAt: new Date(outcome.triggeredAt),
        lastResponseCode: outcome.responseCode,
        lastResponseTimeMs: outcome.responseTimeMs,
        failureCount: outcome.success ? 0 : literal('failure_count + 1'),
      },
      { where: { id: webhookId } },
    );
  }
}
