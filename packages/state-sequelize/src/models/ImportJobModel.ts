import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

/** Epoch columns are BIGINT; some drivers hand them back as strings. */
export interface ImportJobRow {
  id: string;
  filename: string;
  status: string;
  totalRows: number | null;
  processedRows: number;
  createdCount: number;
  updatedCount: number;
  errorCount: number;
  progressPercentage: number | string;
  message: string;
  error: string | null;
  errorDetails: unknown;
  createdAt: number | string;
  startedAt: number | string | null;
  completedAt: number | string | null;
}

export type ImportJobInstance = Model<ImportJobRow, ImportJobRow>;
export type ImportJobModel = ModelStatic<ImportJobInstance>;

export function defineImportJobModel(sequelize: Sequelize): ImportJobModel {
  return sequelize.define<ImportJobInstance>(
    'ImportJob',
    {
      id: {
        type: DataTypes.STRING(36),
        primaryKey: true,
        allowNull: false,
      },
      filename: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      totalRows: {
        type: DataTypes.INTEGER,
        allowNull: true,
      },
      processedRows: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      createdCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      updatedCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      errorCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      progressPercentage: {
        type: DataTypes.DECIMAL(5, 2),
        allowNull: false,
        defaultValue: 0,
      },
      message: {
        type: DataTypes.TEXT,
        allowNull: false,
      },
      error: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      errorDetails: {
        type: DataTypes.JSON,
        allowNull: false,
        defaultValue: [],
      },
      createdAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      startedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      completedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
    },
    {
      tableName: 'import_jobs',
      timestamps: false,
      underscored: true,
      indexes: [{ fields: ['created_at'] }],
    },
  );
}
