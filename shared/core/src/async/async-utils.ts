/**
 * Shared Async Utilities
 *
 * Timeout handling and bounded concurrency used by the polling cycle.
 */

import { TimeoutError } from '@regionguard/types';

// =============================================================================
// Timeout Utilities
// =============================================================================

/**
 * Execute a promise with a timeout.
 * If the promise doesn't settle within timeoutMs, rejects with TimeoutError.
 *
 * @param promise The promise to execute
 * @param timeoutMs Maximum time to wait in milliseconds
 * @param operationName Optional name for error messages
 * @throws TimeoutError if the operation times out
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operationName?: string
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    throw new TypeError(`withTimeout: timeoutMs must be a non-negative finite number, got ${timeoutMs}`);
  }

  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(operationName || 'operation', timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// =============================================================================
// Concurrency Utilities
// =============================================================================

/**
 * Returns each index exactly once. The check-and-increment runs in one
 * synchronous block, so workers on the same event loop never share an index.
 */
function createIndexGenerator(length: number): () => number | null {
  let currentIndex = 0;

  return (): number | null => {
    if (currentIndex >= length) {
      return null;
    }
    return currentIndex++;
  };
}

/**
 * Execute promises with concurrency limit. Results keep input order.
 *
 * @param items Items to process
 * @param fn Async function to apply to each item
 * @param concurrency Maximum concurrent operations
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const getNextIndex = createIndexGenerator(items.length);

  async function worker(): Promise<void> {
    let index: number | null;
    while ((index = getNextIndex()) !== null) {
      results[index] = await fn(items[index], index);
    }
  }

  const workers: Promise<void>[] = [];
  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }

  await Promise.all(workers);
  return results;
}
