import { Clock, SleepAbortedError } from '../common/clock';
import { ProviderTransientError, RefreshAbortedError } from './market-price.errors';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

// attempt counts calls made so far; delayMs is the wait before the next one.
export interface RetryState {
  attempt: number;
  delayMs: number;
  exhausted: boolean;
  lastError?: ProviderTransientError;
}

export const INITIAL_RETRY_STATE: RetryState = { attempt: 0, delayMs: 0, exhausted: false };

/** Exponential backoff: base, 2*base, 4*base... capped at maxDelayMs. */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

export function recordFailure(
  state: RetryState,
  error: ProviderTransientError,
  policy: RetryPolicy,
): RetryState {
  const attempt = state.attempt + 1;
  const exhausted = attempt >= policy.maxAttempts;
  return {
    attempt,
    delayMs: exhausted ? 0 : backoffDelay(attempt, policy),
    exhausted,
    lastError: error,
  };
}

export function toTransientError(error: unknown): ProviderTransientError {
  if (error instanceof ProviderTransientError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderTransientError(message || 'provider call failed');
}

export interface RetryOptions {
  policy: RetryPolicy;
  clock: Clock;
  signal?: AbortSignal;
  onRetry?: (state: RetryState) => void;
}

/**
 * Runs `operation` until it resolves or the policy is exhausted.
 * Every failure, whatever its shape, is normalized to ProviderTransientError.
 * @throws ProviderTransientError carrying the last failure
 * @throws RefreshAbortedError when the signal fires
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, clock, signal, onRetry } = options;
  let state = INITIAL_RETRY_STATE;

  for (;;) {
    if (signal?.aborted) {
      throw new RefreshAbortedError();
    }
    try {
      return await operation();
    } catch (error) {
      const failure = toTransientError(error);
      state = recordFailure(state, failure, policy);
      if (signal?.aborted) {
        throw new RefreshAbortedError();
      }
      if (state.exhausted) {
        throw failure;
      }
      onRetry?.(state);
    }
    try {
      await clock.sleep(state.delayMs, signal);
    } catch (error) {
      if (error instanceof SleepAbortedError) {
        throw new RefreshAbortedError();
      }
      throw error;
    }
  }
}

export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ProviderTransientError(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
