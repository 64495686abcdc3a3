import { setTimeout as delay } from 'node:timers/promises';
import type { ImportJob } from '../domain/model/ImportJob.js';
import { computeProgressPercentage } from '../domain/model/ImportJob.js';
import { canTransition, ImportStatus, isTerminalStatus } from '../domain/model/ImportStatus.js';
import type { BatchOutcome } from '../domain/model/Batch.js';
import type { JobStore } from '../domain/ports/JobStore.js';
import type { DomainEvent } from '../domain/events/DomainEvents.js';
import { InvalidStatusTransitionError } from '../domain/errors.js';
import type { EventBus } from './EventBus.js';
import type { ProgressPublisher } from './ProgressPublisher.js';

export interface ProgressTrackerDeps {
  readonly jobStore: JobStore;
  readonly publisher: ProgressPublisher;
  readonly eventBus: EventBus;
  /** Maximum number of row errors kept on the snapshot. */
  readonly errorSampleSize: number;
  /** Tries at persisting a terminal snapshot. Default: `3`. */
  readonly terminalSaveAttempts?: number;
  /** Pause after the first failed terminal save, doubled after each further one. Default: `100`. */
  readonly terminalSaveRetryDelayMs?: number;
  readonly now?: () => number;
}

const formatCount = (n: number): string => n.toLocaleString('en-US');

/**
 * Sole writer of one job's snapshot.
 *
 * Every operation builds the next snapshot, persists it and only then makes it
 * visible (current snapshot, publisher, event bus). If persisting fails the
 * previous snapshot stays current and the error propagates. Terminal snapshots
 * are retried with backoff before giving up.
 */
export class ProgressTracker {
  private current: ImportJob;
  private readonly now: () => number;
  private readonly terminalSaveAttempts: number;
  private readonly terminalSaveRetryDelayMs: number;

  constructor(
    initial: ImportJob,
    private readonly deps: ProgressTrackerDeps,
  ) {
    this.current = initial;
    this.now = deps.now ?? Date.now;
    this.terminalSaveAttempts = deps.terminalSaveAttempts ?? 3;
    this.terminalSaveRetryDelayMs = deps.terminalSaveRetryDelayMs ?? 100;
  }

  get snapshot(): ImportJob {
    return this.current;
  }

  async begin(totalRows: number | null): Promise<ImportJob> {
    this.assertTransition(ImportStatus.RUNNING);
    const next: ImportJob = {
      ...this.current,
      status: ImportStatus.RUNNING,
      totalRows,
      progressPercentage: computeProgressPercentage(this.current.processedRows, totalRows),
      message: totalRows === null ? 'Processing rows...' : `Processing ${formatCount(totalRows)} rows...`,
      startedAt: this.now(),
    };
    return this.commit(next, (job, timestamp) => ({ type: 'job:started', jobId: job.id, job, timestamp }));
  }

  async applyBatch(outcome: BatchOutcome): Promise<ImportJob> {
    if (this.current.status !== ImportStatus.RUNNING) {
      throw new InvalidStatusTransitionError(this.current.status, ImportStatus.RUNNING);
    }

    const processedRows = this.current.processedRows + outcome.rows;
    // A source that grew after counting must not push progress past 100%.
    const totalRows =
      this.current.totalRows !== null && processedRows > this.current.totalRows ? processedRows : this.current.totalRows;

    const room = this.deps.errorSampleSize - this.current.errorDetails.length;
    const errorDetails =
      room > 0 && outcome.errors.length > 0
        ? [...this.current.errorDetails, ...outcome.errors.slice(0, room)]
        : this.current.errorDetails;

    const next: ImportJob = {
      ...this.current,
      totalRows,
      processedRows,
      createdCount: this.current.createdCount + outcome.created,
      updatedCount: this.current.updatedCount + outcome.updated,
      errorCount: this.current.errorCount + outcome.failedRows,
      progressPercentage: computeProgressPercentage(processedRows, totalRows),
      message:
        totalRows === null
          ? `Processed ${formatCount(processedRows)} rows`
          : `Processed ${formatCount(processedRows)} of ${formatCount(totalRows)} rows`,
      errorDetails,
    };
    return this.commit(next, (job, timestamp) => ({ type: 'job:progress', jobId: job.id, job, timestamp }));
  }

  async complete(): Promise<ImportJob> {
    this.assertTransition(ImportStatus.COMPLETED);
    const { createdCount, updatedCount, errorCount, processedRows } = this.current;
    const totalRows = this.current.totalRows ?? processedRows;
    const next: ImportJob = {
      ...this.current,
      status: ImportStatus.COMPLETED,
      totalRows,
      progressPercentage: computeProgressPercentage(processedRows, totalRows),
      message: `Import completed: ${formatCount(createdCount)} created, ${formatCount(updatedCount)} updated, ${formatCount(errorCount)} errors`,
      completedAt: this.now(),
    };
    return this.commit(next, (job, timestamp) => ({ type: 'job:completed', jobId: job.id, job, timestamp }));
  }

  /**
   * Fail the job. `message` defaults to `Import failed: <error>`.
   *
   * When the failed snapshot cannot be persisted, `job:failed` is still
   * emitted and live listeners are closed with `shutdown` before the save
   * error is rethrown. The stored record keeps its last persisted state.
   */
  async fail(error: string, message = `Import failed: ${error}`): Promise<ImportJob> {
    this.assertTransition(ImportStatus.FAILED);
    const next: ImportJob = {
      ...this.current,
      status: ImportStatus.FAILED,
      message,
      error,
      completedAt: this.now(),
    };
    const toEvent = (job: ImportJob, timestamp: number): DomainEvent => ({
      type: 'job:failed',
      jobId: job.id,
      job,
      error,
      timestamp,
    });

    try {
      return await this.commit(next, toEvent);
    } catch (saveError) {
      this.current = next;
      this.deps.publisher.close(next.id, 'shutdown');
      this.deps.eventBus.emit(toEvent(next, this.now()));
      throw saveError;
    }
  }

  private assertTransition(to: ImportStatus): void {
    if (!canTransition(this.current.status, to)) {
      throw new InvalidStatusTransitionError(this.current.status, to);
    }
  }

  private async commit(next: ImportJob, toEvent: (job: ImportJob, timestamp: number) => DomainEvent): Promise<ImportJob> {
    await this.persist(next);
    this.current = next;
    this.deps.publisher.publish(next);
    this.deps.eventBus.emit(toEvent(next, this.now()));
    return next;
  }

  private async persist(job: ImportJob): Promise<void> {
    const attempts = isTerminalStatus(job.status) ? this.terminalSaveAttempts : 1;
    for (let attempt = 1; ; attempt++) {
      try {
        await this.deps.jobStore.save(job);
        return;
      } catch (error) {
        if (attempt >= attempts) throw error;
        await delay(this.terminalSaveRetryDelayMs * 2 ** (attempt - 1));
      }
    }
  }
}
