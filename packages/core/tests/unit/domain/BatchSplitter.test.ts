import { describe, it, expect } from 'vitest';
import { BatchSplitter } from '../../../src/domain/services/BatchSplitter.js';

async function* range(count: number): AsyncIterable<number> {
  for (let i = 0; i < count; i++) {
    yield await Promise.resolve(i);
  }
}

async function collect<T>(splitter: BatchSplitter, items: AsyncIterable<T>) {
  const batches: Array<{ items: readonly T[]; batchIndex: number }> = [];
  for await (const batch of splitter.split(items)) batches.push(batch);
  return batches;
}

describe('BatchSplitter', () => {
  it('should group items into batches of the configured size', async () => {
    const batches = await collect(new BatchSplitter(2), range(5));

    expect(batches).toEqual([
      { items: [0, 1], batchIndex: 0 },
      { items: [2, 3], batchIndex: 1 },
      { items: [4], batchIndex: 2 },
    ]);
  });

  it('should not yield an empty trailing batch', async () => {
    const batches = await collect(new BatchSplitter(3), range(6));

    expect(batches.map((b) => b.items.length)).toEqual([3, 3]);
  });

  it('should yield nothing for an empty stream', async () => {
    expect(await collect(new BatchSplitter(3), range(0))).toEqual([]);
  });

  it('should reject a non-positive batch size', () => {
    expect(() => new BatchSplitter(0)).toThrow('Batch size must be a positive integer');
  });
});
