import type { ImportJob } from '../model/ImportJob.js';

/**
 * Persistence port for import job snapshots.
 *
 * `save` must replace the stored snapshot in a single atomic write so a reader
 * never observes a partially updated job.
 */
export interface JobStore {
  create(job: ImportJob): Promise<void>;
  save(job: ImportJob): Promise<void>;
  get(jobId: string): Promise<ImportJob | null>;
  /** Most recently created first. */
  list(limit: number): Promise<readonly ImportJob[]>;
  /** Returns `false` when there was nothing to delete. */
  delete(jobId: string): Promise<boolean>;
}
