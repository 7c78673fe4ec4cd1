// Small ordered-collection helpers shared by the curation stages

/**
 * Bucket items by key. Keys keep the order in which they were first seen,
 * and items keep their input order within a bucket.
 */
export function groupBy<T, K>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

/**
 * Split a list into consecutive chunks of at most `size` items.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Map over items with at most `concurrency` calls in flight.
 * Results come back in input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const size = Math.max(1, Math.floor(concurrency));
  const results: R[] = [];
  for (const [batchIndex, batch] of chunk(items, size).entries()) {
    const offset = batchIndex * size;
    const batchResults = await Promise.all(batch.map((item, i) => fn(item, offset + i)));
    results.push(...batchResults);
  }
  return results;
}
