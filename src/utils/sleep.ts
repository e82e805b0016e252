export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

/**
 * Runs `fn` until it resolves to a non-null value or the attempts run out.
 * Thrown errors count as a failed attempt; the last one is rethrown.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T | null>,
  policy: RetryPolicy,
  wait: (ms: number) => Promise<void> = sleep
): Promise<T | null> {
  let lastError: unknown = null;
  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    try {
      const result = await fn(attempt);
      if (result !== null) {
        return result;
      }
      lastError = null;
    } catch (error) {
      lastError = error;
    }
    if (attempt < policy.maxAttempts - 1) {
      await wait(policy.baseDelayMs * Math.pow(2, attempt));
    }
  }
  if (lastError !== null) {
    throw lastError;
  }
  return null;
}
