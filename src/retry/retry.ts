// pattern: Imperative Shell

/**
 * Retry-with-backoff shared by the search client and the page fetcher.
 * Each call site supplies its own policy and isRetryable predicate.
 */

export type RetryPolicy = {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly factor: number;
};

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * Math.pow(policy.factor, attempt);
}

export async function callWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  isRetryable: (error: unknown) => boolean,
  onError?: (error: unknown, attempt: number) => void,
): Promise<T> {
  const attempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (onError) {
        onError(error, attempt);
      }

      if (!isRetryable(error)) {
        throw error;
      }

      if (attempt < attempts - 1) {
        const delayMs = backoffDelay(policy, attempt);
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
    }
  }

  throw lastError;
}
