/**
 * Exponential backoff retry strategy interface
 *
 * Responsibility: re-run a request while it fails with a retryable NetworkError
 * Test strategy: fully mockable; delays go through an overridable sleep
 */

import type { Result } from '@/types/Result';
import type { MaxRetriesExceededError, NetworkError } from '@/types/ApiTypes';

export type BackoffPolicy = {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Adds up to baseDelayMs of random delay to each wait */
  jitter: boolean;
};

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitter: true,
};

export type BackoffOptions = {
  /** Aborting stops further attempts; the last error is returned */
  signal?: AbortSignal;
};

export type RetryError = NetworkError | MaxRetriesExceededError;

export interface IExponentialBackoffHandler {
  executeWithBackoff<T>(
    fn: () => Promise<Result<T, NetworkError>>,
    options?: BackoffOptions
  ): Promise<Result<T, RetryError>>;
}
