export { CsvProductParser } from './infrastructure/parsers/CsvProductParser.js';
export type { CsvProductParserOptions } from './infrastructure/parsers/CsvProductParser.js';
export { ProductRowMapper } from './domain/services/ProductRowMapper.js';
export {
  ProductColumn,
  PRODUCT_COLUMNS,
  REQUIRED_COLUMNS,
  isProductColumn,
  normalizeHeader,
  convertSku,
  convertName,
  convertDescription,
  convertPrice,
  convertQuantity,
  convertIsActive,
} from './domain/model/ProductColumns.js';
export type { CellResult } from './domain/model/ProductColumns.js';
export { MissingColumnsError } from './domain/errors.js';
