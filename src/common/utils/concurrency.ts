const DEFAULT_CONCURRENCY = 5;

type LoggerLike = {
  error: (message: string, trace?: string) => void;
};

export type SleepFn = (ms: number) => Promise<void>;

/** Injection token for the delay used by polling loops and retry backoff. */
export const SLEEP_FN = Symbol('SLEEP_FN');

export const sleep: SleepFn = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export const toError = (reason: unknown): Error => {
  if (reason instanceof Error) return reason;
  return new Error(`Non-Error thrown: ${String(reason)}`);
};

const normalizeConcurrency = (concurrency: number): number => {
  if (!Number.isFinite(concurrency)) {
    throw new RangeError(`Invalid concurrency value: ${concurrency}`);
  }
  const normalized = Math.floor(concurrency);
  if (normalized < 1) {
    throw new RangeError(`Concurrency must be at least 1. Received: ${concurrency}`);
  }
  return normalized;
};

/**
 * Process items with a concurrency limit, returning Promise.allSettled-style results.
 */
export async function processInBatchesSettled<T, R>(
  items: T[],
  processFn: (item: T, index: number) => Promise<R>,
  concurrency: number = DEFAULT_CONCURRENCY,
): Promise<PromiseSettledResult<R>[]> {
  if (items.length === 0) return [];

  const limit = normalizeConcurrency(concurrency);
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let nextIndex = 0;

  const workers = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (true) {
      const currentIndex = nextIndex++;
      if (currentIndex >= items.length) return;

      try {
        const value = await processFn(items[currentIndex], currentIndex);
        results[currentIndex] = { status: 'fulfilled', value };
      } catch (error) {
        results[currentIndex] = { status: 'rejected', reason: error };
      }
    }
  });

  await Promise.all(workers);
  return results;
}

/**
 * Log failed results from Promise.allSettled-style arrays.
 */
export function logFailedResults<T>(
  results: PromiseSettledResult<T>[],
  operation: string,
  logger: LoggerLike,
): AggregateError | null {
  const failedResults = results.filter(
    (result): result is PromiseRejectedResult => result.status === 'rejected',
  );

  if (failedResults.length === 0) {
    return null;
  }

  const errors = failedResults.map((result) => toError(result.reason));
  const message = `Batch operation '${operation}' had ${errors.length} failures out of ${results.length} items`;
  const aggregateError = new AggregateError(errors, message);
  logger.error(message, aggregateError.stack);

  return aggregateError;
}
