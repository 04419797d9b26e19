/**
 * HTTP client
 *
 * Status policy:
 * - 2xx: decode the JSON body; empty body => NoData, bad shape => DecodingError
 * - 401: "expired" in the error message => TokenExpired, else AuthenticationFailed
 * - other 4xx and 5xx: ServerError(code, message)
 * - anything else: ServerError(code)
 * - fetch rejection: Offline, Timeout or TransportError
 *
 * Response payloads are never logged.
 */

import { ok, err, type Result } from '../types/Result';
import type { HttpMethod, NetworkError } from '../types/ApiTypes';
import type { EventChannel } from '../events/EventChannel';
import type { IHttpClient, RequestOptions } from './IHttpClient';
import type { BackoffOptions, IExponentialBackoffHandler, RetryError } from './IExponentialBackoffHandler';
import { ExponentialBackoffHandler } from './ExponentialBackoffHandler';
import { classifyTransportError, extractErrorMessage } from './NetworkErrors';

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export type HttpClientOptions = {
  baseUrl: string;
  /** Value of the X-User-Id header */
  deviceId: () => string;
  /** Read when each request is built */
  currentToken: () => string | null;
  tokenExpired: EventChannel<void>;
  timeoutMs?: number;
  backoff?: IExponentialBackoffHandler;
  /** Defaults to the global fetch, looked up per request */
  fetchFn?: typeof fetch;
};

export class HttpClient implements IHttpClient {
  private readonly timeoutMs: number;
  private readonly backoff: IExponentialBackoffHandler;

  constructor(private readonly options: HttpClientOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.backoff = options.backoff ?? new ExponentialBackoffHandler();
  }

  async request<T>(
    endpoint: string,
    method: HttpMethod,
    options: RequestOptions<T>
  ): Promise<Result<T, NetworkError>> {
    let url: URL;
    try {
      url = new URL(this.options.baseUrl + endpoint);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err({ type: 'InvalidURL', message });
    }

    let body: string | undefined;
    if (options.body !== undefined) {
      try {
        body = JSON.stringify(options.body);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return err({ type: 'InvalidRequest', message });
      }
      if (body === undefined) {
        return err({ type: 'InvalidRequest', message: 'Request body is not JSON-serializable' });
      }
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-User-Id': this.options.deviceId(),
    };
    const token = options.bearerToken !== undefined ? options.bearerToken : this.options.currentToken();
    if (token) {
      headers['Authorization'] = `Bearer ${token}`;
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs ?? this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    let status: number;
    let text: string;
    try {
      const fetchFn = this.options.fetchFn ?? fetch;
      const response = await fetchFn(url, { method, headers, body, signal: controller.signal });
      status = response.status;
      text = await response.text();
    } catch (error) {
      const classified: NetworkError = timedOut ? { type: 'Timeout' } : classifyTransportError(error);
      console.warn(`[HttpClient] ${method} ${endpoint} failed: ${classified.type}`);
      return err(classified);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }

    return this.handleResponse(endpoint, method, status, text, options);
  }

  requestWithRetry<T>(
    endpoint: string,
    method: HttpMethod,
    options: RequestOptions<T>,
    backoff: BackoffOptions = {}
  ): Promise<Result<T, RetryError>> {
    return this.backoff.executeWithBackoff(() => this.request(endpoint, method, options), {
      signal: backoff.signal ?? options.signal,
    });
  }

  private handleResponse<T>(
    endpoint: string,
    method: HttpMethod,
    status: number,
    text: string,
    options: RequestOptions<T>
  ): Result<T, NetworkError> {
    if (status >= 200 && status <= 299) {
      return this.decode(endpoint, method, text, options);
    }

    if (status === 401) {
      const message = extractErrorMessage(text);
      if (message?.toLowerCase().includes('expired')) {
        if (options.notifyOnExpiry !== false) {
          console.warn(`[HttpClient] ${method} ${endpoint}: token expired`);
          this.options.tokenExpired.emit();
        }
        return err({ type: 'TokenExpired' });
      }
      return err({ type: 'AuthenticationFailed', message });
    }

    if (status >= 400 && status <= 599) {
      return err({ type: 'ServerError', code: status, message: extractErrorMessage(text) });
    }

    return err({ type: 'ServerError', code: status });
  }

  private decode<T>(
    endpoint: string,
    method: HttpMethod,
    text: string,
    options: RequestOptions<T>
  ): Result<T, NetworkError> {
    if (text.length === 0) {
      const empty = options.decode(undefined);
      return empty === null ? err({ type: 'NoData' }) : ok(empty);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      console.warn(`[HttpClient] Decoding error for ${method} ${endpoint}: body is not JSON`);
      return err({ type: 'DecodingError' });
    }

    const value = options.decode(json);
    if (value === null) {
      console.warn(`[HttpClient] Decoding error for ${method} ${endpoint}: unexpected shape`);
      return err({ type: 'DecodingError' });
    }
    return ok(value);
  }
}
