/**
 * Auth state machine
 *
 * Owns AuthMode and Session. All mutations happen here, on the event loop, in
 * the order callers make them.
 *
 * Superseding: signOut, signIn, continueAsGuest and startQuickStart bump a
 * generation counter. Async work (sign-in, refresh, validation) remembers the
 * generation it started under and drops its result when that has moved on.
 */

import { ok, err, type Result } from '../types/Result';
import type { NetworkError } from '../types/ApiTypes';
import type {
  AuthMode,
  AuthSnapshot,
  ExternalIdentityAssertion,
  InvalidTransitionError,
  SessionValidity,
  SignInError,
  TokenExpiryOutcome,
  UserTier,
} from '../types/AuthTypes';
import type { ConnectivityStatus } from '../types/ConnectivityTypes';
import type { UserProfile } from '../types/ProfileTypes';
import type { StorageWriteError } from '../types/StorageTypes';
import type { EventChannel, Listener, Unsubscribe } from '../events/EventChannel';
import type { IApiServices } from '../api/IApiServices';
import type { RetryError } from '../api/IExponentialBackoffHandler';
import { toBirthDataPayload } from '../api/ApiServices';
import { describeNetworkError } from '../api/NetworkErrors';
import type { ISettingsManager } from '../settings/SettingsManager';
import type { IConnectivityMonitor } from '../sync/IConnectivityMonitor';
import { RetryScheduler } from '../sync/RetryScheduler';
import { capabilities, type FeatureSet } from '../features/FeatureGate';
import type { IAuthStateMachine, InitializeResult } from './IAuthStateMachine';
import type { ISecureTokenStore } from './ISecureTokenStore';
import type { ISessionValidator } from './ISessionValidator';
import type { ITokenRefresher } from './ITokenRefresher';
import { SessionStore } from './SessionStore';
import { checkTransition, deriveTier, resolveAuthMode } from './AuthTransitions';

export const SESSION_EXPIRED_MESSAGE = 'Your session has expired. Please sign in again.';
export const VALIDATION_UNAVAILABLE_MESSAGE = 'Unable to verify authentication. Some features may be limited.';
export const DEFAULT_RETRY_DELAY_MS = 2000;

export type AuthStateMachineDeps = {
  tokenStore: ISecureTokenStore;
  settings: ISettingsManager;
  api: IApiServices;
  validator: ISessionValidator;
  refresher: ITokenRefresher;
  connectivity: IConnectivityMonitor;
  tokenExpired: EventChannel<void>;
  store?: SessionStore;
  retryDelayMs?: number;
  /** 0 disables polling */
  connectivityPollMs?: number;
};

export class AuthStateMachine implements IAuthStateMachine {
  private readonly store: SessionStore;
  private readonly retry: RetryScheduler<ConnectivityStatus>;
  private readonly subscriptions: Unsubscribe[] = [];

  private generation = 0;
  private initialized: InitializeResult | null = null;
  private pendingRefresh: { generation: number; promise: Promise<TokenExpiryOutcome> } | null = null;
  private profileSync: AbortController | null = null;

  constructor(private readonly deps: AuthStateMachineDeps) {
    this.store = deps.store ?? new SessionStore();
    this.retry = new RetryScheduler('connectivity', deps.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);

    this.subscriptions.push(
      deps.tokenExpired.subscribe(() =>
        this.handleTokenExpiry().then(outcome => {
          console.log(`[AuthStateMachine] Token expiry handled: ${outcome}`);
        })
      ),
      deps.connectivity.onStateChange(status => {
        this.store.update({ connectivity: status });
      })
    );
  }

  initialize(): InitializeResult {
    if (this.initialized) {
      return { mode: this.store.getSnapshot().mode, background: this.initialized.background };
    }

    const { tokenStore, settings } = this.deps;
    const token = tokenStore.get();
    const flags = settings.getTierFlags();
    const mode = resolveAuthMode({
      hasToken: token !== null,
      flags,
      hasSignedIn: settings.hasSignedIn(),
      profile: settings.getProfile(),
      onboardingCompleted: settings.hasCompletedOnboarding(),
    });

    this.transitionTo(mode, {
      session: { bearerToken: token, user: null },
      tier: deriveTier(flags, token !== null),
    });

    const background = this.runStartupChecks(token !== null);
    this.deps.connectivity.startPolling(this.deps.connectivityPollMs ?? 0);
    this.initialized = { mode, background };
    return { mode, background };
  }

  async signInWithExternalIdentity(assertion: ExternalIdentityAssertion): Promise<Result<AuthMode, SignInError>> {
    const generation = ++this.generation;
    const result = await this.deps.api.authenticateWithApple(assertion);

    if (generation !== this.generation) {
      console.log('[AuthStateMachine] Sign-in superseded, discarding result');
      return err({ type: 'Superseded', message: 'Sign-in was cancelled' });
    }
    if (!result.ok) {
      console.warn(`[AuthStateMachine] Sign-in failed: ${result.error.type}`);
      return err({ type: 'SignInFailed', cause: result.error, message: signInErrorMessage(result.error) });
    }

    // Drop refreshes and validations begun against the previous session.
    this.generation++;
    this.pendingRefresh = null;

    const { jwtToken, user } = result.value;
    const { settings } = this.deps;
    const stored = this.deps.tokenStore.put(jwtToken);
    if (!stored.ok) {
      console.warn(`[AuthStateMachine] Token kept in memory only (${stored.error.type})`);
    }
    logWriteFailure('tier flags', settings.setTierFlags({ isAnonymousUser: false, isQuickStartUser: false }));
    logWriteFailure('has-signed-in', settings.setHasSignedIn(true));

    const mode = resolveAuthMode({
      hasToken: true,
      flags: settings.getTierFlags(),
      hasSignedIn: true,
      profile: settings.getProfile(),
      onboardingCompleted: settings.hasCompletedOnboarding(),
    });
    this.transitionTo(mode, {
      session: { bearerToken: jwtToken, user },
      tier: 'Authenticated',
      authError: null,
    });

    this.syncProfile(user.id).catch(reportUnexpected('Birth data sync'));
    return ok(mode);
  }

  continueAsGuest(): AuthMode {
    return this.enterLocalTier('Guest');
  }

  startQuickStart(): AuthMode {
    return this.enterLocalTier('QuickStart');
  }

  async completeProfileSetup(profile?: UserProfile): Promise<Result<void, InvalidTransitionError>> {
    const from = this.store.getSnapshot().mode;
    if (from !== 'NeedsProfileSetup' && from !== 'SignedIn') {
      const error: InvalidTransitionError = {
        type: 'InvalidTransition',
        from,
        to: 'SignedIn',
        message: `Cannot complete profile setup from ${from}`,
      };
      console.error(`[AuthStateMachine] ${error.message}`);
      return err(error);
    }

    const { settings } = this.deps;
    if (profile) {
      logWriteFailure('profile', settings.saveProfile(profile));
    }
    logWriteFailure('onboarding marker', settings.setCompletedOnboarding(true));
    this.transitionTo('SignedIn');

    const userId = this.store.getSnapshot().session.user?.id ?? settings.getDeviceUserId();
    await this.syncProfile(userId);
    return ok(undefined);
  }

  signOut(): void {
    this.generation++;
    this.pendingRefresh = null;
    this.cancelProfileSync();

    const { tokenStore, settings } = this.deps;
    const previousToken = this.store.getSnapshot().session.bearerToken ?? tokenStore.get();

    const deleted = tokenStore.delete();
    if (!deleted.ok) {
      console.error(`[AuthStateMachine] Failed to delete stored token (${deleted.error.type})`);
    }
    logWriteFailure('session flags', settings.clearSessionFlags());

    this.transitionTo('SignedOut', {
      session: { bearerToken: null, user: null },
      tier: null,
      connectionMessage: null,
    });

    if (previousToken) {
      this.deps.api.logout(previousToken).then(result => {
        if (!result.ok) {
          console.warn(`[AuthStateMachine] Server logout failed: ${result.error.type}`);
        }
      }, reportUnexpected('Server logout'));
    }
  }

  handleTokenExpiry(): Promise<TokenExpiryOutcome> {
    const generation = this.generation;
    if (this.pendingRefresh && this.pendingRefresh.generation === generation) {
      return this.pendingRefresh.promise;
    }

    const token = this.store.getSnapshot().session.bearerToken;
    if (!token) {
      return Promise.resolve('NoSession');
    }

    console.log('[AuthStateMachine] Token expired, refreshing');
    const promise: Promise<TokenExpiryOutcome> = this.refreshSession(token, generation).finally(() => {
      if (this.pendingRefresh?.promise === promise) {
        this.pendingRefresh = null;
      }
    });
    this.pendingRefresh = { generation, promise };
    return promise;
  }

  retryConnection(): Promise<ConnectivityStatus> {
    this.store.update({ isRetryingConnection: true });
    return this.retry
      .schedule(() => this.deps.connectivity.probe())
      .finally(() => {
        if (!this.retry.isScheduled()) {
          this.store.update({ isRetryingConnection: false });
        }
      });
  }

  async validateSession(): Promise<SessionValidity | null> {
    const token = this.store.getSnapshot().session.bearerToken;
    if (!token) {
      return null;
    }

    const generation = this.generation;
    const validity = await this.deps.validator.validate(token);
    if (generation !== this.generation || this.store.getSnapshot().session.bearerToken !== token) {
      console.log('[AuthStateMachine] Session changed during validation, ignoring result');
      return validity;
    }

    switch (validity.status) {
      case 'valid':
        this.store.update({ authError: null, connectionMessage: null });
        break;
      case 'invalid':
        console.warn(`[AuthStateMachine] Session rejected by server: ${validity.reason.type}`);
        this.store.update({ authError: SESSION_EXPIRED_MESSAGE });
        this.signOut();
        break;
      case 'indeterminate':
        console.warn(`[AuthStateMachine] Session could not be verified: ${validity.reason.type}`);
        this.store.update({ connectionMessage: VALIDATION_UNAVAILABLE_MESSAGE });
        break;
    }
    return validity;
  }

  getSnapshot(): AuthSnapshot {
    return this.store.getSnapshot();
  }

  subscribe(listener: Listener<AuthSnapshot>): Unsubscribe {
    return this.store.subscribe(listener);
  }

  capabilities(): FeatureSet {
    const snapshot = this.store.getSnapshot();
    return capabilities(snapshot.tier, snapshot.connectivity.connected);
  }

  dispose(): void {
    this.deps.connectivity.stopPolling();
    this.retry.cancel(this.deps.connectivity.getStatus());
    this.cancelProfileSync();
    for (const unsubscribe of this.subscriptions.splice(0)) {
      unsubscribe();
    }
  }

  private enterLocalTier(tier: Extract<UserTier, 'Guest' | 'QuickStart'>): AuthMode {
    this.generation++;
    const { settings } = this.deps;
    const flags = { isAnonymousUser: tier === 'Guest', isQuickStartUser: tier === 'QuickStart' };
    logWriteFailure('tier flags', settings.setTierFlags(flags));
    logWriteFailure('has-signed-in', settings.setHasSignedIn(true));

    const mode = resolveAuthMode({
      hasToken: this.store.getSnapshot().session.bearerToken !== null,
      flags,
      hasSignedIn: true,
      profile: settings.getProfile(),
      onboardingCompleted: settings.hasCompletedOnboarding(),
    });
    this.transitionTo(mode, { tier, authError: null });

    this.deps.connectivity.probe().catch(reportUnexpected('Connectivity probe'));
    return mode;
  }

  private async refreshSession(token: string, generation: number): Promise<TokenExpiryOutcome> {
    const result = await this.deps.refresher.refresh(token);
    if (generation !== this.generation || this.store.getSnapshot().session.bearerToken !== token) {
      console.log('[AuthStateMachine] Refresh superseded, discarding result');
      return 'Superseded';
    }

    if (result.ok) {
      const { jwtToken, user } = result.value;
      const stored = this.deps.tokenStore.put(jwtToken);
      if (!stored.ok) {
        console.warn(`[AuthStateMachine] Refreshed token kept in memory only (${stored.error.type})`);
      }
      this.store.update({ session: { bearerToken: jwtToken, user }, authError: null });
      console.log('[AuthStateMachine] Token refreshed');
      return 'Refreshed';
    }

    console.warn(`[AuthStateMachine] Token refresh failed: ${result.error.type}`);
    this.store.update({ authError: SESSION_EXPIRED_MESSAGE });
    this.signOut();
    return 'SignedOut';
  }

  private async runStartupChecks(hasToken: boolean): Promise<void> {
    try {
      await Promise.all([this.deps.connectivity.probe(), hasToken ? this.validateSession() : null]);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[AuthStateMachine] Startup checks failed: ${message}`);
    }
  }

  private async syncProfile(userId: string): Promise<void> {
    const payload = toBirthDataPayload(this.deps.settings.getProfile());
    if (!payload) {
      return;
    }

    this.cancelProfileSync();
    const controller = new AbortController();
    this.profileSync = controller;

    const result = await this.deps.api.syncBirthData(userId, payload, controller.signal);
    if (this.profileSync === controller) {
      this.profileSync = null;
    }
    if (controller.signal.aborted) {
      console.log('[AuthStateMachine] Birth data sync cancelled');
      return;
    }
    if (!result.ok) {
      console.warn(`[AuthStateMachine] Birth data sync failed: ${describeRetryError(result.error)}`);
      return;
    }
    console.log('[AuthStateMachine] Birth data synced');
  }

  private cancelProfileSync(): void {
    this.profileSync?.abort();
    this.profileSync = null;
  }

  private transitionTo(to: AuthMode, patch: Partial<AuthSnapshot> = {}): void {
    const from = this.store.getSnapshot().mode;
    const check = checkTransition(from, to);
    if (!check.ok) {
      console.error(`[AuthStateMachine] ${check.error.message}`);
      return;
    }
    if (from !== to) {
      console.log(`[AuthStateMachine] ${from} -> ${to}`);
    }
    this.store.update({ ...patch, mode: to });
  }
}

/**
 * Non-technical copy for a failed sign-in.
 */
export function signInErrorMessage(error: NetworkError): string {
  const generic = 'Authentication failed. Please try again.';
  switch (error.type) {
    case 'Offline':
      return 'No internet connection. Please check your network and try again.';
    case 'Timeout':
      return 'Authentication timed out. Please try again.';
    case 'AuthenticationFailed':
      return error.message ?? generic;
    case 'ServerError':
      if (error.code >= 500) {
        return 'Server temporarily unavailable. Please try again later.';
      }
      return error.message ?? generic;
    default:
      return generic;
  }
}

function describeRetryError(error: RetryError): string {
  return error.type === 'MaxRetriesExceeded' ? error.message : describeNetworkError(error);
}

function logWriteFailure(what: string, result: Result<void, StorageWriteError>): void {
  if (!result.ok) {
    console.warn(`[AuthStateMachine] Failed to persist ${what}: ${result.error.message}`);
  }
}

function reportUnexpected(what: string): (error: unknown) => void {
  return error => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[AuthStateMachine] ${what} failed unexpectedly: ${message}`);
  };
}
