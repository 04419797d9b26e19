/**
 * Recoverability rules and user-facing copy for NetworkError.
 */

import type { NetworkError } from '../types/ApiTypes';

/**
 * Transport failures and 5xx responses may succeed on a later attempt.
 */
export function isRetryable(error: NetworkError): boolean {
  switch (error.type) {
    case 'TransportError':
    case 'Timeout':
    case 'Offline':
      return true;
    case 'ServerError':
      return error.code >= 500;
    default:
      return false;
  }
}

export function requiresReauthentication(error: NetworkError): boolean {
  switch (error.type) {
    case 'AuthenticationFailed':
    case 'TokenExpired':
      return true;
    case 'ServerError':
      return error.code === 401;
    default:
      return false;
  }
}

export function describeNetworkError(error: NetworkError): string {
  switch (error.type) {
    case 'InvalidURL':
      return 'Invalid URL';
    case 'InvalidRequest':
      return 'Invalid request';
    case 'NoData':
      return 'No data received';
    case 'DecodingError':
      return 'Failed to decode response';
    case 'ServerError':
      return error.message ? `Server error (${error.code}): ${error.message}` : `Server error: ${error.code}`;
    case 'TransportError':
      return `Network error: ${error.message}`;
    case 'AuthenticationFailed':
      return error.message ?? 'Authentication failed';
    case 'TokenExpired':
      return 'Your session has expired. Please sign in again.';
    case 'Offline':
      return 'No internet connection. Some features may be limited.';
    case 'Timeout':
      return 'Request timed out. Please try again.';
  }
}

/**
 * First string among `message`, `error`, `detail` of a JSON error body, even an empty one.
 */
export function extractErrorMessage(body: string): string | undefined {
  if (body.length === 0) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null) {
    return undefined;
  }

  const record = Object.fromEntries(Object.entries(parsed));
  for (const key of ['message', 'error', 'detail']) {
    const value: unknown = record[key];
    if (typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

const OFFLINE_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'ENETDOWN',
  'EHOSTUNREACH',
  'ECONNRESET',
]);

const TIMEOUT_CODES = new Set(['UND_ERR_CONNECT_TIMEOUT', 'ETIMEDOUT']);

/**
 * Maps a rejection from `fetch` to Offline, Timeout or TransportError.
 * Undici wraps the socket error in `cause`, so both levels are inspected.
 */
export function classifyTransportError(error: unknown): NetworkError {
  if (!(error instanceof Error)) {
    return { type: 'TransportError', message: String(error) };
  }
  if (error.name === 'TimeoutError') {
    return { type: 'Timeout' };
  }

  const codes = [errorCode(error), errorCode(error.cause)];
  if (codes.some(code => code !== null && TIMEOUT_CODES.has(code))) {
    return { type: 'Timeout' };
  }
  if (codes.some(code => code !== null && OFFLINE_CODES.has(code))) {
    return { type: 'Offline' };
  }
  return { type: 'TransportError', message: error.message };
}

function errorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}
