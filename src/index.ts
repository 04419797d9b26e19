export type { Result } from './types/Result';
export { ok, err } from './types/Result';
export type * from './types/ApiTypes';
export type * from './types/AuthTypes';
export type * from './types/ConnectivityTypes';
export type * from './types/ProfileTypes';
export type { StorageWriteError } from './types/StorageTypes';
export { hasMinimalProfileData, hasCompleteLocationData } from './types/ProfileTypes';

export { loadSessionConfig, DEFAULT_SESSION_CONFIG, type SessionConfig } from './config/session';
export { EventChannel, type Listener, type Unsubscribe } from './events/EventChannel';

export type { IKeyValueStorage } from './storage/IKeyValueStorage';
export { JsonFileStorage } from './storage/JsonFileStorage';
export { MemoryStorage } from './storage/MemoryStorage';
export { SettingsManager, type ISettingsManager, type TierFlags } from './settings/SettingsManager';

export type { IHttpClient, RequestOptions } from './api/IHttpClient';
export { HttpClient, type HttpClientOptions } from './api/HttpClient';
export type { IApiServices } from './api/IApiServices';
export { ApiServices, ENDPOINTS } from './api/ApiServices';
export { ExponentialBackoffHandler } from './api/ExponentialBackoffHandler';
export type { BackoffPolicy, IExponentialBackoffHandler, RetryError } from './api/IExponentialBackoffHandler';
export { isRetryable, requiresReauthentication, describeNetworkError } from './api/NetworkErrors';

export type { IConnectivityMonitor } from './sync/IConnectivityMonitor';
export { ConnectivityMonitor, connectivitySummary } from './sync/ConnectivityMonitor';

export type { ISecureTokenStore } from './auth/ISecureTokenStore';
export { EncryptedFileTokenStore } from './auth/EncryptedFileTokenStore';
export { InMemoryTokenStore } from './auth/InMemoryTokenStore';
export { generateKeyString, staticKeyProvider, type KeyProvider } from './auth/TokenCipher';
export type { IAuthStateMachine, InitializeResult } from './auth/IAuthStateMachine';
export { AuthStateMachine } from './auth/AuthStateMachine';
export { createSessionCore, type SessionCore, type SessionCoreOverrides } from './auth/AuthFactory';

export { capabilities, statusMessage, type FeatureSet, type DailyQuota } from './features/FeatureGate';
