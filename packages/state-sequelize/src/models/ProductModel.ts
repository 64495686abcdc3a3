import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model, Optional } from 'sequelize';

export interface ProductRow {
  id: number;
  sku: string;
  name: string;
  description: string | null;
  /** DECIMAL: PostgreSQL returns a string. */
  price: number | string | null;
  quantity: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type ProductCreationRow = Optional<ProductRow, 'id' | 'createdAt' | 'updatedAt'>;
export type ProductInstance = Model<ProductRow, ProductCreationRow>;
export type ProductModel = ModelStatic<ProductInstance>;

export const SKU_MAX_LENGTH = 100;
export const NAME_MAX_LENGTH = 255;
export const PRICE_MAX = 99_999_999.99;
export const QUANTITY_MAX = 2_147_483_647;

export function defineProductModel(sequelize: Sequelize): ProductModel {
  return sequelize.define<ProductInstance>(
    'Product',
    {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: true,
      },
      sku: {
        type: DataTypes.STRING(SKU_MAX_LENGTH),
        allowNull: false,
        unique: true,
        validate: { notEmpty: true },
      },
      name: {
        type: DataTypes.STRING(NAME_MAX_LENGTH),
        allowNull: false,
        validate: { notEmpty: true },
      },
      description: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      price: {
        type: DataTypes.DECIMAL(10, 2),
        allowNull: true,
        validate: { min: 0, max: PRICE_MAX },
      },
      quantity: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
        validate: { min: 0 },
      },
      isActive: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: true,
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
      tableName: 'products',
      timestamps: true,
      underscored: true,
    },
  );
}
