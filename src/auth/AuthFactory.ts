/**
 * Session core factory
 *
 * Composition root: settings storage -> token store -> HttpClient -> services
 * -> state machine. Nothing is a singleton; each call builds an independent core.
 */

import { join } from 'node:path';
import { loadSessionConfig, SETTINGS_FILE_NAME, TOKEN_FILE_NAME, type SessionConfig } from '../config/session';
import { EventChannel } from '../events/EventChannel';
import { JsonFileStorage } from '../storage/JsonFileStorage';
import type { IKeyValueStorage } from '../storage/IKeyValueStorage';
import { SettingsManager } from '../settings/SettingsManager';
import { HttpClient } from '../api/HttpClient';
import { ApiServices } from '../api/ApiServices';
import type { IExponentialBackoffHandler } from '../api/IExponentialBackoffHandler';
import { ConnectivityMonitor } from '../sync/ConnectivityMonitor';
import { AuthStateMachine } from './AuthStateMachine';
import { EncryptedFileTokenStore } from './EncryptedFileTokenStore';
import type { ISecureTokenStore } from './ISecureTokenStore';
import { SessionStore } from './SessionStore';
import { SessionValidator } from './SessionValidator';
import { TokenRefresher } from './TokenRefresher';
import { staticKeyProvider } from './TokenCipher';

export type SessionCoreOverrides = {
  storage?: IKeyValueStorage;
  tokenStore?: ISecureTokenStore;
  backoff?: IExponentialBackoffHandler;
  fetchFn?: typeof fetch;
};

export type SessionCore = {
  machine: AuthStateMachine;
  http: HttpClient;
  api: ApiServices;
  settings: SettingsManager;
  connectivity: ConnectivityMonitor;
};

export function createSessionCore(
  config: SessionConfig = loadSessionConfig(),
  overrides: SessionCoreOverrides = {}
): SessionCore {
  const storage = overrides.storage ?? new JsonFileStorage(join(config.dataDir, SETTINGS_FILE_NAME));
  const tokenStore =
    overrides.tokenStore ??
    new EncryptedFileTokenStore(join(config.dataDir, TOKEN_FILE_NAME), staticKeyProvider(config.tokenKey));
  if (config.tokenKey === null && !overrides.tokenStore) {
    console.warn('[AuthFactory] ASTRO_TOKEN_KEY is not set; the token store stays locked');
  }

  const settings = new SettingsManager(storage);
  const store = new SessionStore();
  const tokenExpired = new EventChannel<void>('tokenExpired');

  const http = new HttpClient({
    baseUrl: config.apiBaseUrl,
    deviceId: () => settings.getDeviceUserId(),
    currentToken: () => store.getSnapshot().session.bearerToken,
    tokenExpired,
    timeoutMs: config.requestTimeoutMs,
    backoff: overrides.backoff,
    fetchFn: overrides.fetchFn,
  });
  const api = new ApiServices(http);
  const connectivity = new ConnectivityMonitor(api);

  const machine = new AuthStateMachine({
    tokenStore,
    settings,
    api,
    validator: new SessionValidator(api),
    refresher: new TokenRefresher(api),
    connectivity,
    tokenExpired,
    store,
    retryDelayMs: config.retryDelayMs,
    connectivityPollMs: config.connectivityPollMs,
  });

  return { machine, http, api, settings, connectivity };
}
