import { describe, it, expect, vi } from 'vitest';
import { ImportEngine } from '../../src/ImportEngine.js';
import { BufferSource } from '../../src/infrastructure/sources/BufferSource.js';
import { InMemoryProductStore } from '../../src/infrastructure/state/InMemoryProductStore.js';
import { InMemoryJobStore } from '../../src/infrastructure/state/InMemoryJobStore.js';
import type { ImportJob } from '../../src/domain/model/ImportJob.js';
import type { ProductStore } from '../../src/domain/ports/ProductStore.js';
import { JobConflictError } from '../../src/domain/errors.js';
import { simpleRowParser, productCsv } from '../helpers/simpleRowParser.js';

/** Product store whose writes wait until `release()` is called. */
function blockingStore() {
  const inner = new InMemoryProductStore();
  const waiting: Array<() => void> = [];
  let inFlight = 0;
  let maxInFlight = 0;

  const store: ProductStore = {
    upsertBatch: async (records) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise<void>((resolve) => waiting.push(resolve));
      inFlight--;
      return inner.upsertBatch(records);
    },
    findBySku: (sku) => inner.findBySku(sku),
    count: () => inner.count(),
  };

  return {
    store,
    get waiting() {
      return waiting.length;
    },
    get maxInFlight() {
      return maxInFlight;
    },
    release(): void {
      for (const resolve of waiting.splice(0)) resolve();
    },
  };
}

/** Job store whose reads hand back their snapshot only after `release()` while held. */
class HeldReadJobStore extends InMemoryJobStore {
  private gate: Promise<void> | null = null;
  private open: () => void = () => undefined;

  hold(): void {
    this.gate = new Promise<void>((resolve) => {
      this.open = resolve;
    });
  }

  release(): void {
    this.gate = null;
    this.open();
  }

  override async get(jobId: string): Promise<ImportJob | null> {
    const snapshot = await super.get(jobId);
    if (this.gate) await this.gate;
    return snapshot;
  }
}

function createEngine(productStore: ProductStore, maxConcurrentJobs = 2, jobStore?: InMemoryJobStore) {
  return new ImportEngine({ parser: simpleRowParser(), productStore, jobStore, batchSize: 2, maxConcurrentJobs });
}

describe('Concurrent imports', () => {
  it('should run distinct jobs at the same time', async () => {
    const blocking = blockingStore();
    const engine = createEngine(blocking.store);

    await engine.import('a.csv', new BufferSource(productCsv(2)));
    await engine.import('b.csv', new BufferSource(productCsv(2, 100)));

    await vi.waitFor(() => expect(blocking.waiting).toBe(2));
    blocking.release();
    await engine.whenIdle();

    expect(blocking.maxInFlight).toBe(2);
  });

  it('should queue jobs beyond the limit', async () => {
    const blocking = blockingStore();
    const engine = createEngine(blocking.store, 1);

    await engine.import('a.csv', new BufferSource(productCsv(2)));
    const queued = await engine.import('b.csv', new BufferSource(productCsv(2, 100)));

    await vi.waitFor(() => expect(blocking.waiting).toBe(1));
    expect((await engine.getStatus(queued.id)).status).toBe('pending');

    blocking.release();
    await vi.waitFor(() => expect(blocking.waiting).toBe(1));
    blocking.release();
    await engine.whenIdle();

    expect((await engine.getStatus(queued.id)).status).toBe('completed');
    expect(blocking.maxInFlight).toBe(1);
  });
});

describe('Cancellation', () => {
  it('should stop a running job between batches and keep committed counts', async () => {
    const blocking = blockingStore();
    const engine = createEngine(blocking.store);
    const job = await engine.import('a.csv', new BufferSource(productCsv(6)));
    await vi.waitFor(() => expect(blocking.waiting).toBe(1));

    const cancelling = engine.cancel(job.id);
    setTimeout(() => blocking.release(), 0);
    const cancelled = await cancelling;

    expect(cancelled.status).toBe('failed');
    expect(cancelled.message).toBe('Import cancelled');
    expect(cancelled.error).toBe('Import cancelled');
    expect(cancelled.processedRows).toBe(2);
    expect(cancelled.createdCount).toBe(2);
    expect(await blocking.store.count()).toBe(2);
  });

  it('should cancel a queued job before it starts', async () => {
    const blocking = blockingStore();
    const engine = createEngine(blocking.store, 1);
    await engine.import('a.csv', new BufferSource(productCsv(2)));
    const queued = await engine.import('b.csv', new BufferSource(productCsv(2, 100)));
    await vi.waitFor(() => expect(blocking.waiting).toBe(1));

    const cancelled = await engine.cancel(queued.id);

    expect(cancelled.status).toBe('failed');
    expect(cancelled.processedRows).toBe(0);
    expect(cancelled.startedAt).toBeNull();

    blocking.release();
    await engine.whenIdle();
  });

  it('should cancel a job that was never submitted', async () => {
    const engine = createEngine(new InMemoryProductStore());
    const job = await engine.createJob('a.csv');

    const cancelled = await engine.cancel(job.id);

    expect(cancelled.status).toBe('failed');
    expect(cancelled.message).toBe('Import cancelled');
  });

  it('should refuse to cancel a finished job', async () => {
    const engine = createEngine(new InMemoryProductStore());
    const job = await engine.import('a.csv', new BufferSource(productCsv(1)));
    await engine.whenIdle();

    await expect(engine.cancel(job.id)).rejects.toBeInstanceOf(JobConflictError);
  });

  it('should refuse to cancel a job that finished while the cancel was reading it', async () => {
    const jobStore = new HeldReadJobStore();
    const engine = createEngine(new InMemoryProductStore(), 2, jobStore);
    const terminal: string[] = [];
    engine.on('job:completed', (event) => terminal.push(event.type));
    engine.on('job:failed', (event) => terminal.push(event.type));
    const job = await engine.import('a.csv', new BufferSource(productCsv(3)));

    jobStore.hold();
    const cancelling = engine.cancel(job.id);
    await engine.whenIdle();
    jobStore.release();

    await expect(cancelling).rejects.toThrow("Cannot cancel import job in status 'completed'");
    const finished = await engine.getStatus(job.id);
    expect(finished.status).toBe('completed');
    expect(finished.processedRows).toBe(3);
    expect(finished.createdCount).toBe(3);
    expect(finished.error).toBeNull();
    expect(terminal).toEqual(['job:completed']);
  });

  it('should finish running jobs and cancel queued ones on shutdown', async () => {
    const blocking = blockingStore();
    const engine = createEngine(blocking.store, 1);
    const running = await engine.import('a.csv', new BufferSource(productCsv(2)));
    const queued = await engine.import('b.csv', new BufferSource(productCsv(2, 100)));
    await vi.waitFor(() => expect(blocking.waiting).toBe(1));

    const stopping = engine.shutdown();
    setTimeout(() => blocking.release(), 0);
    await stopping;

    expect((await engine.getStatus(running.id)).status).toBe('completed');
    expect((await engine.getStatus(queued.id)).status).toBe('failed');
  });
});
