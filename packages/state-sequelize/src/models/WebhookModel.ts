import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model, Optional } from 'sequelize';

export interface WebhookRow {
  id: number;
  name: string;
  url: string;
  eventType: string;
  isEnabled: boolean;
  secret: string | null;
  lastTriggeredAt: Date | null;
  lastResponseCode: number | null;
  lastResponseTimeMs: number | null;
  failureCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export type WebhookCreationRow = Optional<
  WebhookRow,
  | 'id'
  | 'isEnabled'
  | 'secret'
  | 'lastTriggeredAt'
  | 'lastResponseCode'
  | 'lastResponseTimeMs'
  | 'failureCount'
  | 'createdAt'
  | 'updatedAt'
>;
export type WebhookInstance = Model<WebhookRow, WebhookCreationRow>;
export type WebhookModel = ModelStatic<WebhookInstance>;

export function defineWebhookModel(sequelize: Sequelize): WebhookModel {
  return sequelize.define<WebhookInstance>(
    'Webhook',
    {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: true,
      },
      name: {
        type: DataTypes.STRING(100),
        allowNull: false,
      },
      url: {
        type: DataTypes.STRING(500),
        allowNull: false,
      },
      eventType: {
        type: DataTypes.STRING(50),
        allowNull: false,
      },
      isEnabled: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: true,
      },
      secret: {
        type: DataTypes.STRING(100),
        allowNull: true,
      },
      lastTriggeredAt: {
        type: DataTypes.DATE,
        allowNull: true,
      },
      lastResponseCode: {
        type: DataTypes.INTEGER,
        allowNull: true,
      },
      lastResponseTimeMs: {
        type: DataTypes.INTEGER,
        allowNull: true,
      },
      failureCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      createdAt: {
        type: DataTypes.DATE,
        allowNull: false,
      },
      updatedAt: {
        type: DataTypes.DATE,
        allowNull: false,
      },
    },
    {
      tableName: 'webhooks',
      timestamps: true,
      underscored: true,
      indexes: [{ fields: ['event_type', 'is_enabled'] }],
    },
  );
}
