export interface RetryOptions {
  attempts?: number;
  delayMs?: number;
  backoffFactor?: number;
  maxDelayMs?: number;
  /** Return false to rethrow immediately (e.g. a venue rejection is not transient). */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelay(failures: number, baseMs: number, maxMs: number, factor = 2) {
  if (failures <= 0) return 0;
  return Math.min(maxMs, Math.ceil(baseMs * Math.pow(factor, failures - 1)));
}

export async function retry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const baseDelay = Math.max(0, options.delayMs ?? 250);
  const backoff = options.backoffFactor ?? 2;
  const maxDelay = options.maxDelayMs ?? 5_000;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= attempts || (options.shouldRetry && !options.shouldRetry(error))) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      const delay = backoffDelay(attempt, baseDelay, maxDelay, backoff);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
}
