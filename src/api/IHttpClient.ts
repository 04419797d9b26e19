/**
 * HTTP client interface
 *
 * Responsibility: build requests with identity headers, classify outcomes into
 * NetworkError, decode typed responses
 * Test strategy: stub the global fetch with real Response objects
 *
 * The client never signs anyone out. A TokenExpired response is reported to the
 * expiry channel and returned to the caller.
 */

import type { Result } from '@/types/Result';
import type { Decoder, HttpMethod, NetworkError } from '@/types/ApiTypes';
import type { BackoffOptions, RetryError } from './IExponentialBackoffHandler';

export type RequestOptions<T> = {
  /** An empty 2xx body is passed as undefined; returning null there gives NoData. */
  decode: Decoder<T>;
  /** Serialized as JSON */
  body?: unknown;
  /**
   * Overrides the current session token for this request; null sends no
   * Authorization header.
   */
  bearerToken?: string | null;
  /** false keeps a TokenExpired response off the expiry channel (default true) */
  notifyOnExpiry?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export interface IHttpClient {
  request<T>(endpoint: string, method: HttpMethod, options: RequestOptions<T>): Promise<Result<T, NetworkError>>;

  /**
   * Same as request(), re-run under the backoff policy while the error is retryable.
   */
  requestWithRetry<T>(
    endpoint: string,
    method: HttpMethod,
    options: RequestOptions<T>,
    backoff?: BackoffOptions
  ): Promise<Result<T, RetryError>>;
}
