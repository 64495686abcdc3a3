import type { Logger } from 'pino';
import { JobConflictError } from '../domain/errors.js';

/** Work for one job. Must watch `signal` and settle once the job is terminal. */
export type ImportTask = (signal: AbortSignal) => Promise<void>;

export interface ImportWorkerPoolOptions {
  /** Jobs allowed to run at the same time. Default: `2`. */
  readonly maxConcurrentJobs?: number;
  readonly logger: Logger;
}

class Completion {
  readonly promise: Promise<void>;
  private settle: () => void = () => undefined;

  constructor() {
    this.promise = new Promise<void>((resolve) => {
      this.settle = resolve;
    });
  }

  resolve(): void {
    this.settle();
  }
}

interface PoolEntry {
  readonly jobId: string;
  readonly task: ImportTask;
  readonly controller: AbortController;
  readonly completion: Completion;
}

/**
 * Runs import jobs off the caller's execution path.
 *
 * At most one task per job id; distinct jobs run concurrently up to the
 * limit and the rest wait in FIFO order.
 */
export class ImportWorkerPool {
  private readonly maxConcurrentJobs: number;
  private readonly logger: Logger;
  private readonly queue: PoolEntry[] = [];
  private readonly running = new Map<string, PoolEntry>();
  private accepting = true;

  constructor(options: ImportWorkerPoolOptions) {
    this.maxConcurrentJobs = options.maxConcurrentJobs ?? 2;
    this.logger = options.logger;
    if (!Number.isInteger(this.maxConcurrentJobs) || this.maxConcurrentJobs < 1) {
      throw new Error(`maxConcurrentJobs must be a positive integer, received ${String(this.maxConcurrentJobs)}`);
    }
  }

  get runningCount(): number {
    return this.running.size;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  has(jobId: string): boolean {
    return this.running.has(jobId) || this.queue.some((entry) => entry.jobId === jobId);
  }

  /** Queue a task. The task starts on a later tick, never inside this call. */
  submit(jobId: string, task: ImportTask): void {
    if (!this.accepting) {
      throw new JobConflictError(jobId, 'Import worker pool is shutting down');
    }
    if (this.has(jobId)) {
      throw new JobConflictError(jobId, `Import job ${jobId} is already queued or running`);
    }

    this.queue.push({ jobId, task, controller: new AbortController(), completion: new Completion() });
    this.logger.debug({ jobId, queued: this.queue.length, running: this.running.size }, 'Import job queued');
    this.drain();
  }

  /**
   * Abort a queued or running job. A queued job is started right away so it
   * can record its cancellation. Resolves once the task has settled; `null`
   * when the pool does not know the job.
   */
  cancel(jobId: string): Promise<void> | null {
    const running = this.running.get(jobId);
    if (running) {
      running.controller.abort();
      return running.completion.promise;
    }

    const position = this.queue.findIndex((entry) => entry.jobId === jobId);
    const queued = this.queue[position];
    if (!queued) return null;

    this.queue.splice(position, 1);
    queued.controller.abort();
    this.start(queued);
    return queued.completion.promise;
  }

  /** Resolves when nothing is queued or running. */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running.values()].map((entry) => entry.completion.promise));
    }
  }

  /** Stop accepting work, cancel queued jobs and wait for running ones. */
  async shutdown(): Promise<void> {
    this.accepting = false;
    for (const entry of [...this.queue]) {
      await this.cancel(entry.jobId);
    }
    await this.whenIdle();
  }

  private drain(): void {
    while (this.running.size < this.maxConcurrentJobs) {
      const next = this.queue.shift();
      if (!next) return;
      this.start(next);
    }
  }

  private start(entry: PoolEntry): void {
    this.running.set(entry.jobId, entry);

    void new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => entry.task(entry.controller.signal))
      .catch((error: unknown) => {
        this.logger.error({ err: error, jobId: entry.jobId }, 'Import task crashed');
      })
      .finally(() => {
        this.running.delete(entry.jobId);
        entry.completion.resolve();
        this.drain();
      });
  }
}
