/** Splits a stream of items into fixed-size groups. */
export class BatchSplitter {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error(`Batch size must be a positive integer, received ${String(batchSize)}`);
    }
  }

  /**
   * Yield consecutive groups of `batchSize` items; the last group may be smaller.
   * Only one group is held in memory at a time.
   */
  async *split<T>(items: AsyncIterable<T>): AsyncIterable<{ items: readonly T[]; batchIndex: number }> {
    let buffer: T[] = [];
    let batchIndex = 0;

    for await (const item of items) {
      buffer.push(item);
      if (buffer.length >= this.batchSize) {
        yield { items: buffer, batchIndex };
        buffer = [];
        batchIndex++;
      }
    }

    if (buffer.length > 0) {
      yield { items: buffer, batchIndex };
    }
  }
}
