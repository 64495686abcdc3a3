import type { JobStore } from '../../domain/ports/JobStore.js';
import type { ImportJob } from '../../domain/model/ImportJob.js';

/** Non-persistent job store. Used as the default when no custom JobStore is provided. */
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, ImportJob>();

  create(job: ImportJob): Promise<void> {
    if (this.jobs.has(job.id)) {
      return Promise.reject(new Error(`Import job already exists: ${job.id}`));
    }
    this.jobs.set(job.id, job);
    return Promise.resolve();
  }

  save(job: ImportJob): Promise<void> {
    this.jobs.set(job.id, job);
    return Promise.resolve();
  }

  get(jobId: string): Promise<ImportJob | null> {
    return Promise.resolve(this.jobs.get(jobId) ?? null);
  }

  list(limit: number): Promise<readonly ImportJob[]> {
    const newestFirst = [...this.jobs.values()].reverse().sort((a, b) => b.createdAt - a.createdAt);
    return Promise.resolve(newestFirst.slice(0, limit));
  }

  delete(jobId: string): Promise<boolean> {
    return Promise.resolve(this.jobs.delete(jobId));
  }
}
