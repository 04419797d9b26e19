/**
 * Exponential backoff retry strategy
 *
 * Retries only errors for which isRetryable() holds; any other failure is
 * returned as-is after the first attempt.
 *
 * Delay: min(baseDelay * 2^attempt + jitter, maxDelay)
 */

import { err, type Result } from '../types/Result';
import type { NetworkError } from '../types/ApiTypes';
import {
  DEFAULT_BACKOFF_POLICY,
  type BackoffOptions,
  type BackoffPolicy,
  type IExponentialBackoffHandler,
  type RetryError,
} from './IExponentialBackoffHandler';
import { describeNetworkError, isRetryable } from './NetworkErrors';

export class ExponentialBackoffHandler implements IExponentialBackoffHandler {
  private readonly policy: BackoffPolicy;

  constructor(policy: Partial<BackoffPolicy> = {}) {
    this.policy = { ...DEFAULT_BACKOFF_POLICY, ...policy };
  }

  async executeWithBackoff<T>(
    fn: () => Promise<Result<T, NetworkError>>,
    options: BackoffOptions = {}
  ): Promise<Result<T, RetryError>> {
    const { maxRetries } = this.policy;
    let attempt = 0;

    for (;;) {
      const result = await fn();
      if (result.ok || !isRetryable(result.error)) {
        return result;
      }

      const lastError = result.error;
      if (options.signal?.aborted) {
        return err(lastError);
      }

      if (attempt >= maxRetries) {
        console.warn(`[ExponentialBackoffHandler] Giving up after ${maxRetries} retries (${lastError.type})`);
        return err({
          type: 'MaxRetriesExceeded',
          message: describeNetworkError(lastError),
          retriesAttempted: maxRetries,
          lastError,
        });
      }

      const delayMs = this.calculateDelay(attempt);
      console.log(`[ExponentialBackoffHandler] ${lastError.type}, retrying in ${delayMs}ms (retry #${attempt + 1})`);
      await this.sleep(delayMs, options.signal);
      attempt++;

      if (options.signal?.aborted) {
        return err(lastError);
      }
    }
  }

  getPolicy(): Readonly<BackoffPolicy> {
    return this.policy;
  }

  private calculateDelay(attempt: number): number {
    const { baseDelayMs, maxDelayMs, jitter } = this.policy;
    const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
    const jitterMs = jitter ? Math.random() * baseDelayMs : 0;
    return Math.min(exponentialDelay + jitterMs, maxDelayMs);
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
