export { WebhookDispatcher } from './application/WebhookDispatcher.js';
export type {
  WebhookDispatcherOptions,
  FetchLike,
  DeliveryResult,
  WebhookTestResult,
} from './application/WebhookDispatcher.js';
export { bindImportWebhooks } from './application/bindImportWebhooks.js';

export type { WebhookEvent, WebhookPayload, ImportEventData, ProductDeletedData } from './domain/WebhookEvent.js';
export {
  buildPayload,
  importStarted,
  importCompleted,
  importFailed,
  productCreated,
  productUpdated,
  productDeleted,
} from './domain/WebhookEvent.js';
export { signPayload, verifySignature } from './domain/signature.js';
