import type { Logger } from 'pino';
import type { ImportJob } from '../../domain/model/ImportJob.js';
import type { BatchOutcome } from '../../domain/model/Batch.js';
import type { ParsedRow, SourcedRecord } from '../../domain/model/ProductRecord.js';
import type { RowError } from '../../domain/model/RowError.js';
import { countFailedRows } from '../../domain/model/RowError.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { RowParser } from '../../domain/ports/RowParser.js';
import type { ProductStore } from '../../domain/ports/ProductStore.js';
import { BatchSplitter } from '../../domain/services/BatchSplitter.js';
import { ImportCancelledError } from '../../domain/errors.js';
import type { EventBus } from '../EventBus.js';
import type { ProgressTracker } from '../ProgressTracker.js';

export interface RunImportDeps {
  readonly parser: RowParser;
  readonly productStore: ProductStore;
  readonly eventBus: EventBus;
  readonly batchSize: number;
  readonly logger: Logger;
}

/**
 * Use case: drive one job from `pending` to a terminal state.
 *
 * read → parse → batch → upsert, one batch at a time. Row problems are
 * counted and the run continues; anything else fails the job. Cancellation is
 * honoured between batches, keeping what was already committed.
 */
export class RunImport {
  constructor(
    private readonly tracker: ProgressTracker,
    private readonly deps: RunImportDeps,
    private readonly signal: AbortSignal,
  ) {}

  async execute(source: DataSource): Promise<ImportJob> {
    const jobId = this.tracker.snapshot.id;
    const logger = this.deps.logger.child({ jobId });

    try {
      this.assertNotCancelled();
      const totalRows = source.replayable ? await this.countRows(source) : null;
      this.assertNotCancelled();

      const { rows } = await this.deps.parser.open(source.read());
      await this.tracker.begin(totalRows);
      logger.info({ totalRows, fileName: source.metadata().fileName }, 'Import started');

      const splitter = new BatchSplitter(this.deps.batchSize);
      for await (const { items, batchIndex } of splitter.split(rows)) {
        this.assertNotCancelled();
        const outcome = await this.applyBatch(items, batchIndex);
        await this.tracker.applyBatch(outcome);
        this.deps.eventBus.emit({
          type: 'batch:completed',
          jobId,
          batchIndex,
          rowCount: outcome.rows,
          createdCount: outcome.created,
          updatedCount: outcome.updated,
          failedCount: outcome.failedRows,
          timestamp: Date.now(),
        });
      }

      const completed = await this.tracker.complete();
      logger.info(
        {
          processedRows: completed.processedRows,
          createdCount: completed.createdCount,
          updatedCount: completed.updatedCount,
          errorCount: completed.errorCount,
        },
        'Import completed',
      );
      return completed;
    } catch (error) {
      if (error instanceof ImportCancelledError) {
        logger.info('Import cancelled');
        return this.tracker.fail(error.message, error.message);
      }
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ err: error }, 'Import failed');
      return this.tracker.fail(reason);
    }
  }

  /** Full pass over a replayable source; header problems surface here already. */
  private async countRows(source: DataSource): Promise<number> {
    const { rows } = await this.deps.parser.open(source.read());
    let total = 0;
    for await (const _row of rows) {
      void _row;
      total++;
    }
    return total;
  }

  private async applyBatch(rows: readonly ParsedRow[], batchIndex: number): Promise<BatchOutcome> {
    const valid: SourcedRecord[] = [];
    const errors: RowError[] = [];
    let invalidRows = 0;

    for (const row of rows) {
      if (row.ok) {
        valid.push({ rowIndex: row.rowIndex, record: row.record });
      } else {
        invalidRows++;
        errors.push(...row.errors);
      }
    }

    const result = valid.length > 0 ? await this.deps.productStore.upsertBatch(valid) : null;
    if (result) errors.push(...result.errors);

    return {
      batchIndex,
      rows: rows.length,
      created: result?.created ?? 0,
      updated: result?.updated ?? 0,
      failedRows: invalidRows + (result ? countFailedRows(result.errors) : 0),
      errors: errors.sort((a, b) => a.rowIndex - b.rowIndex),
    };
  }

  private assertNotCancelled(): void {
    if (this.signal.aborted) throw new ImportCancelledError();
  }
}
