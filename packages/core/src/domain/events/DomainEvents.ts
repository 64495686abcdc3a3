import type { ImportJob } from '../model/ImportJob.js';

/** Emitted once the job has been persisted in `pending` state. */
export interface JobCreatedEvent {
  readonly type: 'job:created';
  readonly jobId: string;
  readonly job: ImportJob;
  readonly timestamp: number;
}

/** Emitted when the header is accepted and the job enters `running`. */
export interface JobStartedEvent {
  readonly type: 'job:started';
  readonly jobId: string;
  readonly job: ImportJob;
  readonly timestamp: number;
}

/** Emitted after each committed batch snapshot. */
export interface JobProgressEvent {
  readonly type: 'job:progress';
  readonly jobId: string;
  readonly job: ImportJob;
  readonly timestamp: number;
}

export interface JobCompletedEvent {
  readonly type: 'job:completed';
  readonly jobId: string;
  readonly job: ImportJob;
  readonly timestamp: number;
}

/** Emitted when the job fails, including when it is cancelled. */
export interface JobFailedEvent {
  readonly type: 'job:failed';
  readonly jobId: string;
  readonly job: ImportJob;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a batch has been applied to the product store. */
export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly jobId: string;
  readonly batchIndex: number;
  readonly rowCount: number;
  readonly createdCount: number;
  readonly updatedCount: number;
  readonly failedCount: number;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | JobCreatedEvent
  | JobStartedEvent
  | JobProgressEvent
  | JobCompletedEvent
  | JobFailedEvent
  | BatchCompletedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
