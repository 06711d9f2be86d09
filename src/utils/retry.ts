export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  factor?: number;
  jitterMs?: number;
  /** Returning false rethrows immediately instead of retrying. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (input: { attempt: number; nextDelayMs: number; error: unknown }) => Promise<void> | void;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export const backoffDelayMs = (attempt: number, opts: RetryOptions): number => {
  const factor = opts.factor ?? 2;
  const exponential = opts.baseDelayMs * factor ** (attempt - 1);
  const bounded = Math.min(exponential, opts.maxDelayMs ?? exponential);
  const jitter = opts.jitterMs ? Math.floor(Math.random() * opts.jitterMs) : 0;
  return Math.max(0, Math.floor(bounded + jitter));
};

export async function retryWithBackoff<T>(
  work: (attempt: number) => Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  let attempt = 0;

  while (true) {
    attempt += 1;

    try {
      return await work(attempt);
    } catch (error) {
      if (attempt >= opts.maxAttempts || (opts.shouldRetry && !opts.shouldRetry(error))) {
        throw error;
      }

      const nextDelayMs = backoffDelayMs(attempt, opts);
      await opts.onRetry?.({ attempt, nextDelayMs, error });
      await sleep(nextDelayMs);
    }
  }
}
