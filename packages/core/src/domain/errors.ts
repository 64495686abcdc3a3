import type { ImportStatus } from './model/ImportStatus.js';

export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Import job not found: ${jobId}`);
    this.name = 'JobNotFoundError';
  }
}

/** The job exists but cannot take the requested action in its current state. */
export class JobConflictError extends Error {
  constructor(
    readonly jobId: string,
    message: string,
  ) {
    super(message);
    this.name = 'JobConflictError';
  }
}

export class InvalidStatusTransitionError extends Error {
  constructor(
    readonly from: ImportStatus,
    readonly to: ImportStatus,
  ) {
    super(`Invalid state transition: ${from} → ${to}`);
    this.name = 'InvalidStatusTransitionError';
  }
}

export class WebhookNotFoundError extends Error {
  constructor(readonly webhookId: number) {
    super(`Webhook not found: ${String(webhookId)}`);
    this.name = 'WebhookNotFoundError';
  }
}

/** Raised inside a run when the job has been cancelled. */
export class ImportCancelledError extends Error {
  constructor() {
    super('Import cancelled');
    this.name = 'ImportCancelledError';
  }
}
