export interface BatchLimits {
  /** Maximum groups per request. */
  batchSize: number;
  /** Maximum conversation characters per request. */
  maxBatchCharacters: number;
  /** When positive, the count cap grows so no more than this many requests go out. */
  maxBatches?: number;
}

export function effectiveBatchSize(total: number, limits: BatchLimits): number {
  const configured = Math.max(1, limits.batchSize);
  if (!limits.maxBatches || limits.maxBatches <= 0) return configured;
  return Math.max(configured, Math.ceil(total / limits.maxBatches));
}

/**
 * Greedy grouping in processing order: an entry joins the open batch unless
 * that would break the count cap, the character cap, or `fits`.
 */
export function groupIntoBatches<T>(
  entries: T[],
  size: (entry: T) => number,
  limits: BatchLimits,
  fits: (candidate: T[]) => boolean = () => true
): T[][] {
  const perBatch = effectiveBatchSize(entries.length, limits);
  const batches: T[][] = [];
  let current: T[] = [];
  let currentChars = 0;

  for (const entry of entries) {
    const chars = size(entry);
    if (
      current.length > 0 &&
      (current.length >= perBatch ||
        currentChars + chars > limits.maxBatchCharacters ||
        !fits([...current, entry]))
    ) {
      batches.push(current);
      current = [];
      currentChars = 0;
    }
    current.push(entry);
    currentChars += chars;
  }

  if (current.length > 0) batches.push(current);
  return batches;
}
