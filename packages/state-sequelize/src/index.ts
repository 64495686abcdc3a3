export { SequelizeJobStore } from './SequelizeJobStore.js';
export { SequelizeProductStore } from './SequelizeProductStore.js';
export { SequelizeWebhookStore } from './SequelizeWebhookStore.js';
export { defineImportJobModel } from './models/ImportJobModel.js';
export type { ImportJobRow, ImportJobModel } from './models/ImportJobModel.js';
export { defineProductModel } from './models/ProductModel.js';
export type { ProductRow, ProductModel } from './models/ProductModel.js';
export { defineWebhookModel } from './models/WebhookModel.js';
export type { WebhookRow, WebhookModel } from './models/WebhookModel.js';
