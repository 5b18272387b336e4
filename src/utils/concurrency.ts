import pLimit from 'p-limit';

// Worker pool sizing: pure functions of expected workload, capped

export function tourPoolSize(tourCount: number, max: number = 8): number {
  return Math.max(1, Math.min(max, Math.floor(tourCount / 20) + 3));
}

export function collectionPoolSize(collectionCount: number, max: number = 5): number {
  return Math.max(1, Math.min(max, collectionCount));
}

export function pagePoolSize(expectedTours: number | undefined, max: number = 8): number {
  if (expectedTours === undefined || expectedTours <= 100) return Math.min(5, max);
  return Math.max(1, Math.min(max, Math.floor(expectedTours / 50) + 3));
}

/**
 * Runs `task` over `items` with at most `size` in flight.
 * Results keep the input order.
 */
export async function mapPool<T, R>(items: T[], size: number, task: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const limit = pLimit(Math.max(1, size));
  return Promise.all(items.map((item, index) => limit(() => task(item, index))));
}
