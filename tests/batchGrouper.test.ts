import { describe, it, expect } from 'vitest';
import { effectiveBatchSize, groupIntoBatches } from '../src/batching/batchGrouper';

const identity = (n: number): number => n;

describe('groupIntoBatches', () => {
  it('honours the count cap and the character cap together', () => {
    const batches = groupIntoBatches(new Array<number>(7).fill(20000), identity, {
      batchSize: 3,
      maxBatchCharacters: 60000,
    });
    expect(batches.map(batch => batch.length)).toEqual([3, 3, 1]);
  });

  it('closes a batch early when characters run out', () => {
    const batches = groupIntoBatches([50000, 20000, 5000], identity, {
      batchSize: 3,
      maxBatchCharacters: 60000,
    });
    expect(batches).toEqual([[50000], [20000, 5000]]);
  });

  it('gives an oversized entry a batch of its own', () => {
    expect(groupIntoBatches([70000, 10], identity, { batchSize: 3, maxBatchCharacters: 60000 })).toEqual([
      [70000],
      [10],
    ]);
  });

  it('keeps processing order', () => {
    expect(groupIntoBatches([1, 2, 3, 4], identity, { batchSize: 2, maxBatchCharacters: 100 })).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it('widens batches to respect maxBatches', () => {
    const batches = groupIntoBatches(new Array<number>(10).fill(1), identity, {
      batchSize: 3,
      maxBatchCharacters: 1000,
      maxBatches: 2,
    });
    expect(batches.map(batch => batch.length)).toEqual([5, 5]);
  });

  it('closes a batch when the candidate no longer fits', () => {
    const sum = (batch: number[]): number => batch.reduce((total, n) => total + n, 0);
    const batches = groupIntoBatches([1, 2, 3, 4], identity, { batchSize: 10, maxBatchCharacters: 100 }, batch => sum(batch) <= 5);
    expect(batches).toEqual([[1, 2], [3], [4]]);
  });
});

describe('effectiveBatchSize', () => {
  it('never drops below the configured size', () => {
    expect(effectiveBatchSize(4, { batchSize: 3, maxBatchCharacters: 1, maxBatches: 4 })).toBe(3);
    expect(effectiveBatchSize(4, { batchSize: 0, maxBatchCharacters: 1 })).toBe(1);
  });
});
