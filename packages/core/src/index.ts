// Main entry point
export { ImportEngine } from './ImportEngine.js';
export type { ImportEngineConfig } from './ImportEngine.js';

// Domain model
export type { ImportJob } from './domain/model/ImportJob.js';
export { createImportJob, computeProgressPercentage } from './domain/model/ImportJob.js';
export { ImportStatus, IMPORT_STATUSES, canTransition, isTerminalStatus, isImportStatus } from './domain/model/ImportStatus.js';
export type {
  ProductRecord,
  OptionalProductField,
  SourcedRecord,
  ParsedRow,
  Product,
} from './domain/model/ProductRecord.js';
export {
  OPTIONAL_PRODUCT_FIELDS,
  PRODUCT_DEFAULTS,
  normalizeSku,
  presentOptionalFields,
} from './domain/model/ProductRecord.js';
export type { RowError } from './domain/model/RowError.js';
export { rowError, countFailedRows } from './domain/model/RowError.js';
export type { BatchOutcome } from './domain/model/Batch.js';
export type { Webhook, DeliveryOutcome } from './domain/model/Webhook.js';
export {
  WebhookEventType,
  WEBHOOK_EVENT_TYPES,
  WEBHOOK_EVENT_LABELS,
  isWebhookEventType,
} from './domain/model/Webhook.js';

// Errors
export {
  JobNotFoundError,
  JobConflictError,
  InvalidStatusTransitionError,
  WebhookNotFoundError,
  ImportCancelledError,
} from './domain/errors.js';

// Wire views
export type { ImportJobView, ProductView } from './domain/views.js';
export { toImportJobView, toProductView } from './domain/views.js';

// Domain services
export { BatchSplitter } from './domain/services/BatchSplitter.js';

// Application
export { EventBus } from './application/EventBus.js';
export { ProgressTracker } from './application/ProgressTracker.js';
export type { ProgressTrackerDeps } from './application/ProgressTracker.js';
export { ProgressPublisher } from './application/ProgressPublisher.js';
export type { ProgressSubscriber, ChannelCloseReason } from './application/ProgressPublisher.js';
export { ImportWorkerPool } from './application/ImportWorkerPool.js';
export type { ImportTask, ImportWorkerPoolOptions } from './application/ImportWorkerPool.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { RowParser, ParsedRowStream } from './domain/ports/RowParser.js';
export type { JobStore } from './domain/ports/JobStore.js';
export type { ProductStore, UpsertResult } from './domain/ports/ProductStore.js';
export type { WebhookStore } from './domain/ports/WebhookStore.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  JobCreatedEvent,
  JobStartedEvent,
  JobProgressEvent,
  JobCompletedEvent,
  JobFailedEvent,
  BatchCompletedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export type { BufferSourceOptions } from './infrastructure/sources/BufferSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { InMemoryJobStore } from './infrastructure/state/InMemoryJobStore.js';
export { InMemoryProductStore } from './infrastructure/state/InMemoryProductStore.js';
export type { InMemoryProductStoreOptions } from './infrastructure/state/InMemoryProductStore.js';
export { InMemoryWebhookStore } from './infrastructure/state/InMemoryWebhookStore.js';
export type { WebhookDefinition } from './infrastructure/state/InMemoryWebhookStore.js';
export { createLogger } from './infrastructure/logging/createLogger.js';
export type { Logger } from 'pino';
