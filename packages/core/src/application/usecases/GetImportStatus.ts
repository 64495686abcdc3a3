import type { ImportJob } from '../../domain/model/ImportJob.js';
import type { JobStore } from '../../domain/ports/JobStore.js';
import { JobNotFoundError } from '../../domain/errors.js';

/** Use case: read the latest committed snapshot of a job. */
export class GetImportStatus {
  constructor(private readonly jobStore: JobStore) {}

  async execute(jobId: string): Promise<ImportJob> {
    const job = await this.jobStore.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }
}
