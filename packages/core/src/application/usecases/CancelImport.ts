import type { ImportJob } from '../../domain/model/ImportJob.js';
import { isTerminalStatus } from '../../domain/model/ImportStatus.js';
import { JobConflictError, ImportCancelledError } from '../../domain/errors.js';
import type { ImportWorkerPool } from '../ImportWorkerPool.js';
import type { ProgressTracker } from '../ProgressTracker.js';
import type { GetImportStatus } from './GetImportStatus.js';

/** Use case: stop a pending or running job. The job ends `failed` with message `Import cancelled`. */
export class CancelImport {
  constructor(
    private readonly getStatus: GetImportStatus,
    private readonly pool: ImportWorkerPool,
    private readonly trackerFor: (job: ImportJob) => ProgressTracker,
  ) {}

  async execute(jobId: string): Promise<ImportJob> {
    const job = await this.getStatus.execute(jobId);
    if (isTerminalStatus(job.status)) {
      throw new JobConflictError(jobId, `Cannot cancel import job in status '${job.status}'`);
    }

    const settled = this.pool.cancel(jobId);
    if (settled) {
      await settled;
      return this.getStatus.execute(jobId);
    }

    // Nobody is running the job in this process. A worker may have finished it
    // while it was being read, so decide on a fresh snapshot.
    const latest = await this.getStatus.execute(jobId);
    if (isTerminalStatus(latest.status)) {
      throw new JobConflictError(jobId, `Cannot cancel import job in status '${latest.status}'`);
    }
    const reason = new ImportCancelledError().message;
    return this.trackerFor(latest).fail(reason, reason);
  }
}
