import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { ImportJob } from './domain/model/ImportJob.js';
import { createImportJob } from './domain/model/ImportJob.js';
import { ImportStatus, isTerminalStatus } from './domain/model/ImportStatus.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { RowParser } from './domain/ports/RowParser.js';
import type { JobStore } from './domain/ports/JobStore.js';
import type { ProductStore } from './domain/ports/ProductStore.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { JobConflictError } from './domain/errors.js';
import { EventBus } from './application/EventBus.js';
import { ProgressTracker } from './application/ProgressTracker.js';
import { ProgressPublisher } from './application/ProgressPublisher.js';
import type { ProgressSubscriber } from './application/ProgressPublisher.js';
import { ImportWorkerPool } from './application/ImportWorkerPool.js';
import { RunImport } from './application/usecases/RunImport.js';
import { CancelImport } from './application/usecases/CancelImport.js';
import { GetImportStatus } from './application/usecases/GetImportStatus.js';
import { InMemoryJobStore } from './infrastructure/state/InMemoryJobStore.js';
import { createLogger } from './infrastructure/logging/createLogger.js';

/** Configuration for the import engine. */
export interface ImportEngineConfig {
  /** Turns source text into product rows. */
  readonly parser: RowParser;
  /** Destination of the upserts. */
  readonly productStore: ProductStore;
  /** Persistence for job snapshots. Default: `InMemoryJobStore`. */
  readonly jobStore?: JobStore;
  /** Live snapshot fan-out. Default: a new `ProgressPublisher`. */
  readonly publisher?: ProgressPublisher;
  /** Rows per upsert batch. Default: `5000`. */
  readonly batchSize?: number;
  /** Jobs processed at the same time. Default: `2`. */
  readonly maxConcurrentJobs?: number;
  /** Row errors kept on each job. Default: `100`. */
  readonly errorSampleSize?: number;
  /** Default: a silent logger. */
  readonly logger?: Logger;
  /** Clock for snapshot timestamps. Default: `Date.now`. */
  readonly now?: () => number;
}

/**
 * Facade over the import lifecycle: create → submit → (progress) → completed | failed.
 *
 * Delegates each operation to a use case in `application/usecases/` and owns
 * the shared collaborators they operate on.
 *
 * @example
 * ```typescript
 * const engine = new ImportEngine({ parser: new CsvProductParser(), productStore });
 * const job = await engine.createJob('products.csv');
 * await engine.submit(job.id, new FilePathSource('/tmp/products.csv'));
 * ```
 */
export class ImportEngine {
  private readonly parser: RowParser;
  private readonly productStore: ProductStore;
  private readonly jobStore: JobStore;
  private readonly publisher: ProgressPublisher;
  private readonly eventBus: EventBus;
  private readonly pool: ImportWorkerPool;
  private readonly batchSize: number;
  private readonly errorSampleSize: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly getImportStatus: GetImportStatus;
  private readonly cancelImport: CancelImport;

  constructor(config: ImportEngineConfig) {
    this.parser = config.parser;
    this.productStore = config.productStore;
    this.jobStore = config.jobStore ?? new InMemoryJobStore();
    this.logger = config.logger ?? createLogger({ level: 'silent' });
    this.publisher = config.publisher ?? new ProgressPublisher(this.logger);
    this.eventBus = new EventBus(this.logger);
    this.pool = new ImportWorkerPool({ maxConcurrentJobs: config.maxConcurrentJobs ?? 2, logger: this.logger });
    this.batchSize = config.batchSize ?? 5000;
    this.errorSampleSize = config.errorSampleSize ?? 100;
    this.now = config.now ?? Date.now;
    this.getImportStatus = new GetImportStatus(this.jobStore);
    this.cancelImport = new CancelImport(this.getImportStatus, this.pool, (job) => this.trackerFor(job));
  }

  /** Persist a new `pending` job. */
  async createJob(filename: string, jobId: string = randomUUID()): Promise<ImportJob> {
    const job = createImportJob(jobId, filename, this.now());
    await this.jobStore.create(job);
    this.eventBus.emit({ type: 'job:created', jobId, job, timestamp: this.now() });
    return job;
  }

  /**
   * Hand a pending job and its source to the worker pool. Resolves as soon as
   * the job is queued; processing happens later, off the caller's path.
   * The source is disposed once the job ends, or right away if it is rejected.
   */
  async submit(jobId: string, source: DataSource): Promise<void> {
    try {
      const job = await this.getImportStatus.execute(jobId);
      if (job.status !== ImportStatus.PENDING) {
        throw new JobConflictError(jobId, `Cannot start import job in status '${job.status}'`);
      }

      const tracker = this.trackerFor(job);
      this.pool.submit(jobId, async (signal) => {
        try {
          await new RunImport(
            tracker,
            {
              parser: this.parser,
              productStore: this.productStore,
              eventBus: this.eventBus,
              batchSize: this.batchSize,
              logger: this.logger,
            },
            signal,
          ).execute(source);
        } finally {
          await this.disposeSource(jobId, source);
        }
      });
    } catch (error) {
      await this.disposeSource(jobId, source);
      throw error;
    }
  }

  /** `createJob` followed by `submit`. */
  async import(filename: string, source: DataSource): Promise<ImportJob> {
    const job = await this.createJob(filename);
    await this.submit(job.id, source);
    return job;
  }

  /** Latest committed snapshot. Throws `JobNotFoundError` for an unknown id. */
  async getStatus(jobId: string): Promise<ImportJob> {
    return this.getImportStatus.execute(jobId);
  }

  async listJobs(limit = 10): Promise<readonly ImportJob[]> {
    return this.jobStore.list(limit);
  }

  async cancel(jobId: string): Promise<ImportJob> {
    return this.cancelImport.execute(jobId);
  }

  /** Remove a finished job's record. Active jobs are refused. */
  async deleteJob(jobId: string): Promise<void> {
    const job = await this.getImportStatus.execute(jobId);
    if (!isTerminalStatus(job.status) || this.pool.has(jobId)) {
      throw new JobConflictError(jobId, `Cannot delete import job in status '${job.status}'`);
    }
    await this.jobStore.delete(jobId);
  }

  /** Listen to live snapshots of one job. Returns the unsubscribe handle. */
  subscribe(jobId: string, subscriber: ProgressSubscriber): () => void {
    return this.publisher.subscribe(jobId, subscriber);
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  /** Resolves when no job is queued or running. */
  async whenIdle(): Promise<void> {
    return this.pool.whenIdle();
  }

  /** End every live snapshot channel with reason `shutdown`. */
  closeStreams(): void {
    this.publisher.closeAll();
  }

  /** Cancel queued jobs, wait for running ones and close live channels. */
  async shutdown(): Promise<void> {
    await this.pool.shutdown();
    this.publisher.closeAll();
  }

  private trackerFor(job: ImportJob): ProgressTracker {
    return new ProgressTracker(job, {
      jobStore: this.jobStore,
      publisher: this.publisher,
      eventBus: this.eventBus,
      errorSampleSize: this.errorSampleSize,
      now: this.now,
    });
  }

  private async disposeSource(jobId: string, source: DataSource): Promise<void> {
    if (!source.dispose) return;
    try {
      await source.dispose();
    } catch (error) {
      this.logger.warn({ err: error, jobId }, 'Failed to dispose import source');
    }
  }
}
