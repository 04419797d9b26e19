/**
 * Session core configuration
 *
 * Responsibility: single place that turns environment variables into typed settings
 *
 * Variables:
 * - ASTRO_API_BASE_URL          backend origin (default http://127.0.0.1:8080)
 * - ASTRO_REQUEST_TIMEOUT_MS    per-request timeout (default 10000)
 * - ASTRO_DATA_DIR              where the settings and token files live
 * - ASTRO_TOKEN_KEY             key for the encrypted token file; unset = locked store
 * - ASTRO_CONNECTIVITY_POLL_MS  health-check polling interval, 0 disables (default 0)
 * - ASTRO_RETRY_DELAY_MS        delay before retryConnection probes (default 2000)
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export interface SessionConfig {
  apiBaseUrl: string;
  requestTimeoutMs: number;
  dataDir: string;
  tokenKey: string | null;
  connectivityPollMs: number;
  retryDelayMs: number;
}

export const DEFAULT_SESSION_CONFIG = {
  apiBaseUrl: 'http://127.0.0.1:8080',
  requestTimeoutMs: 10_000,
  connectivityPollMs: 0,
  retryDelayMs: 2_000,
} as const;

export const SETTINGS_FILE_NAME = 'settings.json';
export const TOKEN_FILE_NAME = 'session.token';

export function loadSessionConfig(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  const tokenKey = env.ASTRO_TOKEN_KEY?.trim();

  return {
    apiBaseUrl: stripTrailingSlash(env.ASTRO_API_BASE_URL?.trim() || DEFAULT_SESSION_CONFIG.apiBaseUrl),
    requestTimeoutMs: readNumber(env, 'ASTRO_REQUEST_TIMEOUT_MS', DEFAULT_SESSION_CONFIG.requestTimeoutMs),
    dataDir: env.ASTRO_DATA_DIR?.trim() || join(homedir(), '.astro-session'),
    tokenKey: tokenKey ? tokenKey : null,
    connectivityPollMs: readNumber(env, 'ASTRO_CONNECTIVITY_POLL_MS', DEFAULT_SESSION_CONFIG.connectivityPollMs),
    retryDelayMs: readNumber(env, 'ASTRO_RETRY_DELAY_MS', DEFAULT_SESSION_CONFIG.retryDelayMs),
  };
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    console.warn(`[SessionConfig] Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function stripTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}
