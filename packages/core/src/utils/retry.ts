import { TfmapError } from '../errors.js';
import { errorMessage } from './error-utils.js';

export interface RetryPolicy {
  /** Extra attempts after the first one. */
  retries: number;
  initialDelay: number;
  delayCap: number;
  /**
   * Defaults to the error's own `recoverable` flag; errors that are not a
   * {@link TfmapError} are retried.
   */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 2,
  initialDelay: 500,
  delayCap: 15000,
};

function isRetryable(policy: RetryPolicy, error: unknown): boolean {
  if (policy.shouldRetry) return policy.shouldRetry(error);
  return !(error instanceof TfmapError) || error.recoverable;
}

/** Exponential backoff with jitter in [50%, 100%] of the step. */
export function backoffDelay(policy: RetryPolicy, attempt: number, random = Math.random): number {
  const step = Math.min(policy.initialDelay * 2 ** (attempt - 1), policy.delayCap);
  return step * (0.5 + random() * 0.5);
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  options: Partial<RetryPolicy> = {}
): Promise<T> {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...options };

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt > policy.retries || !isRetryable(policy, error)) {
        throw error;
      }
      const delay = backoffDelay(policy, attempt);
      policy.onRetry?.(attempt, delay, error);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

/** One-line description of a retry, for debug output. */
export function describeRetry(attempt: number, retries: number, delayMs: number, error: unknown): string {
  return `Attempt ${String(attempt)}/${String(retries)} failed, retrying in ${String(Math.round(delayMs))}ms: ${errorMessage(error)}`;
}
