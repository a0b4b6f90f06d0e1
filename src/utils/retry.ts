export interface RetryPolicy {
  label: string;
  retries: number;
  baseDelayMs: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (details: { label: string; attempt: number; delayMs: number; error: unknown }) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * Math.pow(2, attempt - 1);
}

/**
 * Runs `fn` up to `retries + 1` times, waiting `baseDelayMs * 2^(attempt - 1)`
 * between attempts. The last error is rethrown once attempts are exhausted.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, policy: RetryPolicy): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.retries) + 1);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      const retryable = policy.shouldRetry ? policy.shouldRetry(error) : true;
      if (attempt >= maxAttempts || !retryable) {
        break;
      }

      const delayMs = backoffDelay(policy.baseDelayMs, attempt);
      policy.onRetry?.({ label: policy.label, attempt, delayMs, error });
      await sleep(delayMs);
    }
  }

  throw lastError;
}

export function logRetry(tag: string): NonNullable<RetryPolicy["onRetry"]> {
  return ({ label, attempt, delayMs, error }) => {
    const reason = error instanceof Error ? error.message : "unknown error";
    console.warn(`[${tag}] ${label} failed (${reason}); retry ${attempt} in ${(delayMs / 1000).toFixed(1)}s`);
  };
}
