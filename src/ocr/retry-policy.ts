export interface RetryPolicy {
  /** Retries after the first attempt. */
  retries: number;
  /** Wait before the first retry; each later retry doubles it. */
  baseDelayMs: number;
  /** Treat 404 as transient: a freshly signed URL or a cold analysis worker can lag. */
  retryOnNotFound: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 3,
  baseDelayMs: 2000,
  retryOnNotFound: true,
};

/** Delay before retry number `retry` (1-based): 2s, 4s, 8s with the defaults. */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  return policy.baseDelayMs * 2 ** (retry - 1);
}

export function isRetryableStatus(policy: RetryPolicy, status: number): boolean {
  if (status >= 500 || status === 408) {
    return true;
  }
  return status === 404 && policy.retryOnNotFound;
}
