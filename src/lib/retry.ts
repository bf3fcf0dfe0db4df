export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; delay_ms: number; error: unknown }) => void;
  wait?: (ms: number) => Promise<void>;
};

/** Runs `task` until it succeeds, a non-retryable error is thrown, or attempts run out. */
export const withRetry = async <T>(task: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> => {
  const wait = options.wait ?? sleep;
  const maxAttempts = Math.max(1, options.maxAttempts);
  let attempt = 1;
  for (;;) {
    try {
      return await task(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !options.shouldRetry(err)) {
        throw err;
      }
      const delay_ms = Math.min(options.baseDelayMs * 2 ** (attempt - 1), options.maxDelayMs ?? 10_000);
      options.onRetry?.({ attempt, delay_ms, error: err });
      await wait(delay_ms);
      attempt += 1;
    }
  }
};
