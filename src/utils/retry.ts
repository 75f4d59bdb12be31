export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  factor?: number;
  jitterMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (input: { attempt: number; nextDelayMs: number; error: unknown }) => Promise<void> | void;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export async function retryWithBackoff<T>(
  work: (attempt: number) => Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const factor = opts.factor ?? 2;
  const jitterMs = opts.jitterMs ?? 0;

  let attempt = 0;

  while (true) {
    attempt += 1;

    try {
      return await work(attempt);
    } catch (error) {
      if (attempt >= opts.maxAttempts || (opts.shouldRetry && !opts.shouldRetry(error))) {
        throw error;
      }

      const exponential = opts.baseDelayMs * factor ** (attempt - 1);
      const bounded = Math.min(exponential, opts.maxDelayMs ?? exponential);
      const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
      const nextDelayMs = Math.max(0, Math.floor(bounded + jitter));

      await opts.onRetry?.({ attempt, nextDelayMs, error });
      await sleep(nextDelayMs);
    }
  }
}

/**
 * Races `work` against a timer. The underlying promise keeps running after a
 * timeout; callers that care about a late result keep their own reference.
 */
export async function withTimeout<T>(work: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
