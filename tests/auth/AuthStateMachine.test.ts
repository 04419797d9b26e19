import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AuthStateMachine,
  SESSION_EXPIRED_MESSAGE,
  VALIDATION_UNAVAILABLE_MESSAGE,
  signInErrorMessage,
} from '@/auth/AuthStateMachine';
import { InMemoryTokenStore } from '@/auth/InMemoryTokenStore';
import { EncryptedFileTokenStore } from '@/auth/EncryptedFileTokenStore';
import { SessionValidator } from '@/auth/SessionValidator';
import { TokenRefresher } from '@/auth/TokenRefresher';
import { staticKeyProvider } from '@/auth/TokenCipher';
import type { ISecureTokenStore } from '@/auth/ISecureTokenStore';
import { EventChannel } from '@/events/EventChannel';
import { MemoryStorage } from '@/storage/MemoryStorage';
import { SettingsManager } from '@/settings/SettingsManager';
import { ConnectivityMonitor } from '@/sync/ConnectivityMonitor';
import { ok, err, type Result } from '@/types/Result';
import type { NetworkError } from '@/types/ApiTypes';
import type { AuthResponse, AuthSnapshot } from '@/types/AuthTypes';
import type { UserProfile } from '@/types/ProfileTypes';
import { createMockApi, type MockApi } from '../fakes/mockApi';
import { deferred } from '../fakes/deferred';

const BIRTH_DATE_ONLY: UserProfile = { birthDate: '1990-04-12' };

const FULL_PROFILE: UserProfile = {
  birthDate: '1990-04-12',
  birthTime: '06:30',
  birthPlace: 'Lisbon',
  birthLatitude: 38.7,
  birthLongitude: -9.1,
  timezone: 'Europe/Lisbon',
};

const ASSERTION = { idToken: 'test-id-token', userIdentifier: 'apple-user-1' };

type SetupOptions = {
  token?: string | null;
  settings?: Record<string, unknown>;
  tokenStore?: ISecureTokenStore;
  storage?: MemoryStorage;
  connectivityPollMs?: number;
};

function setup(options: SetupOptions = {}) {
  const api: MockApi = createMockApi();
  const tokenStore = options.tokenStore ?? new InMemoryTokenStore(options.token ?? null);
  const storage = options.storage ?? new MemoryStorage(options.settings ?? {});
  const settings = new SettingsManager(storage);
  const tokenExpired = new EventChannel<void>('tokenExpired');
  const connectivity = new ConnectivityMonitor(api, () => 1000);
  const machine = new AuthStateMachine({
    tokenStore,
    settings,
    api,
    validator: new SessionValidator(api),
    refresher: new TokenRefresher(api),
    connectivity,
    tokenExpired,
    retryDelayMs: 2000,
    connectivityPollMs: options.connectivityPollMs ?? 0,
  });
  return { api, tokenStore, storage, settings, tokenExpired, connectivity, machine };
}

describe('AuthStateMachine', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('initialize', () => {
    it('should resolve SignedOut on a fresh install without waiting for the network', () => {
      const { api, machine } = setup();
      api.healthCheck.mockReturnValue(new Promise(() => undefined));

      const { mode } = machine.initialize();

      expect(mode).toBe('SignedOut');
      expect(machine.getSnapshot().mode).toBe('SignedOut');
      expect(machine.getSnapshot().tier).toBeNull();
      expect(api.validateToken).not.toHaveBeenCalled();
    });

    it('should resolve SignedIn immediately for a stored token and cached profile, then confirm it', async () => {
      const { api, machine } = setup({ token: 'cached-token', settings: { user_profile: FULL_PROFILE } });
      const validation = deferred<Result<{ valid: boolean }, NetworkError>>();
      api.validateToken.mockReturnValueOnce(validation.promise);

      const { mode, background } = machine.initialize();
      const seen: AuthSnapshot[] = [];
      machine.subscribe(snapshot => {
        seen.push(snapshot);
      });

      expect(mode).toBe('SignedIn');
      expect(machine.getSnapshot().tier).toBe('Authenticated');
      expect(machine.getSnapshot().session.bearerToken).toBe('cached-token');

      validation.resolve(ok({ valid: true }));
      await background;

      expect(api.validateToken).toHaveBeenCalledWith('cached-token');
      expect(machine.getSnapshot().mode).toBe('SignedIn');
      expect(seen.every(snapshot => snapshot.mode === 'SignedIn')).toBe(true);
    });

    it('should need profile setup for a stored token without a birth date', () => {
      const { machine } = setup({ token: 'cached-token' });

      expect(machine.initialize().mode).toBe('NeedsProfileSetup');
    });

    it('should keep a guest SignedIn without any credential', () => {
      const { machine } = setup({ settings: { is_anonymous_user: true, user_profile: BIRTH_DATE_ONLY } });

      expect(machine.initialize().mode).toBe('SignedIn');
      expect(machine.getSnapshot().tier).toBe('Guest');
      expect(machine.getSnapshot().session.bearerToken).toBeNull();
    });

    it('should return the current mode without re-running on a second call', () => {
      const { api, machine } = setup();

      const first = machine.initialize();
      const second = machine.initialize();

      expect(second.mode).toBe('SignedOut');
      expect(second.background).toBe(first.background);
      expect(api.healthCheck).toHaveBeenCalledTimes(1);
    });

    it('should keep the mode when /health times out', async () => {
      const { api, machine } = setup({ token: 'cached-token', settings: { user_profile: BIRTH_DATE_ONLY } });
      api.healthCheck.mockResolvedValue(err({ type: 'Timeout' }));

      const { background } = machine.initialize();
      await background;

      expect(machine.getSnapshot().connectivity).toEqual({
        connected: false,
        lastError: 'Timeout',
        message: 'Connection timeout - check your internet',
        checkedAt: 1000,
      });
      expect(machine.getSnapshot().mode).toBe('SignedIn');
    });
  });

  describe('validateSession', () => {
    it('should sign out with the session-expired message when the server rejects the token', async () => {
      const { api, machine, tokenStore } = setup({ token: 'cached-token', settings: { user_profile: BIRTH_DATE_ONLY } });
      api.validateToken.mockResolvedValueOnce(ok({ valid: false }));

      await machine.initialize().background;

      expect(machine.getSnapshot().mode).toBe('SignedOut');
      expect(machine.getSnapshot().authError).toBe(SESSION_EXPIRED_MESSAGE);
      expect(tokenStore.get()).toBeNull();
    });

    it('should keep the session and flag limited connectivity when validation is indeterminate', async () => {
      const { api, machine } = setup({ token: 'cached-token', settings: { user_profile: BIRTH_DATE_ONLY } });
      api.validateToken.mockResolvedValueOnce(err({ type: 'Offline' }));

      await machine.initialize().background;

      const snapshot = machine.getSnapshot();
      expect(snapshot.mode).toBe('SignedIn');
      expect(snapshot.session.bearerToken).toBe('cached-token');
      expect(snapshot.connectionMessage).toBe(VALIDATION_UNAVAILABLE_MESSAGE);
    });

    it('should ignore a result that arrives after sign-out', async () => {
      const { api, machine } = setup({ token: 'cached-token', settings: { user_profile: BIRTH_DATE_ONLY } });
      const validation = deferred<Result<{ valid: boolean }, NetworkError>>();
      api.validateToken.mockReturnValueOnce(validation.promise);

      const { background } = machine.initialize();
      machine.signOut();
      validation.resolve(ok({ valid: false }));
      await background;

      expect(machine.getSnapshot().mode).toBe('SignedOut');
      expect(machine.getSnapshot().authError).toBeNull();
    });

    it('should return null without a token', async () => {
      const { api, machine } = setup();

      expect(await machine.validateSession()).toBeNull();
      expect(api.validateToken).not.toHaveBeenCalled();
    });
  });

  describe('signInWithExternalIdentity', () => {
    it('should store the token and resolve the mode from the cached profile', async () => {
      const { api, machine, tokenStore, settings } = setup({
        settings: { user_profile: BIRTH_DATE_ONLY, is_anonymous_user: true },
      });

      const result = await machine.signInWithExternalIdentity(ASSERTION);

      expect(result).toEqual({ ok: true, value: 'SignedIn' });
      expect(api.authenticateWithApple).toHaveBeenCalledWith(ASSERTION);
      expect(tokenStore.get()).toBe('test-jwt');
      expect(machine.getSnapshot().session).toEqual({
        bearerToken: 'test-jwt',
        user: { id: 'user-1', email: 'ada@example.com', displayName: 'Ada' },
      });
      expect(machine.getSnapshot().tier).toBe('Authenticated');
      expect(settings.getTierFlags()).toEqual({ isAnonymousUser: false, isQuickStartUser: false });
      expect(settings.hasSignedIn()).toBe(true);
    });

    it('should need profile setup when no birth date is cached', async () => {
      const { machine } = setup();

      const result = await machine.signInWithExternalIdentity(ASSERTION);

      expect(result).toEqual({ ok: true, value: 'NeedsProfileSetup' });
    });

    it('should leave state untouched and explain the failure', async () => {
      const { api, machine, tokenStore } = setup();
      api.authenticateWithApple.mockResolvedValueOnce(err({ type: 'Offline' }));
      const before = machine.getSnapshot();

      const result = await machine.signInWithExternalIdentity(ASSERTION);

      expect(result).toEqual({
        ok: false,
        error: {
          type: 'SignInFailed',
          cause: { type: 'Offline' },
          message: 'No internet connection. Please check your network and try again.',
        },
      });
      expect(machine.getSnapshot()).toBe(before);
      expect(tokenStore.get()).toBeNull();
    });

    it('should keep the token in memory when it cannot be stored', async () => {
      const lockedStore = new EncryptedFileTokenStore('/nonexistent/session.token', staticKeyProvider(null));
      const { machine } = setup({ tokenStore: lockedStore, settings: { user_profile: BIRTH_DATE_ONLY } });

      const result = await machine.signInWithExternalIdentity(ASSERTION);

      expect(result.ok).toBe(true);
      expect(machine.getSnapshot().session.bearerToken).toBe('test-jwt');
      expect(lockedStore.get()).toBeNull();
    });

    it('should sync birth data when the profile has complete location data', async () => {
      const { api, machine } = setup({ settings: { user_profile: FULL_PROFILE } });

      await machine.signInWithExternalIdentity(ASSERTION);

      expect(api.syncBirthData).toHaveBeenCalledWith(
        'user-1',
        {
          date: '1990-04-12',
          time: '06:30',
          timezone: 'Europe/Lisbon',
          latitude: 38.7,
          longitude: -9.1,
          locationName: 'Lisbon',
        },
        expect.any(AbortSignal)
      );
    });

    it('should lose to a sign-out issued while it is in flight', async () => {
      const { api, machine, tokenStore } = setup({ settings: { user_profile: BIRTH_DATE_ONLY } });
      const response = deferred<Result<AuthResponse, NetworkError>>();
      api.authenticateWithApple.mockReturnValueOnce(response.promise);

      const pending = machine.signInWithExternalIdentity(ASSERTION);
      machine.signOut();
      response.resolve(ok({ jwtToken: 'late-jwt', user: { id: 'user-1' } }));
      const result = await pending;

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.type).toBe('Superseded');
      }
      expect(machine.getSnapshot().mode).toBe('SignedOut');
      expect(machine.getSnapshot().session.bearerToken).toBeNull();
      expect(tokenStore.get()).toBeNull();
    });

    it('should lose to guest mode chosen while it is in flight', async () => {
      const { api, machine } = setup({ settings: { user_profile: BIRTH_DATE_ONLY } });
      const response = deferred<Result<AuthResponse, NetworkError>>();
      api.authenticateWithApple.mockReturnValueOnce(response.promise);

      const pending = machine.signInWithExternalIdentity(ASSERTION);
      machine.continueAsGuest();
      response.resolve(ok({ jwtToken: 'late-jwt', user: { id: 'user-1' } }));
      const result = await pending;

      expect(result.ok).toBe(false);
      expect(machine.getSnapshot().tier).toBe('Guest');
      expect(machine.getSnapshot().session.bearerToken).toBeNull();
    });
  });

  describe('signInErrorMessage', () => {
    it('should map failures to non-technical copy', () => {
      expect(signInErrorMessage({ type: 'Timeout' })).toBe('Authentication timed out. Please try again.');
      expect(signInErrorMessage({ type: 'ServerError', code: 503 })).toBe(
        'Server temporarily unavailable. Please try again later.'
      );
      expect(signInErrorMessage({ type: 'ServerError', code: 400, message: 'Invalid identity token' })).toBe(
        'Invalid identity token'
      );
      expect(signInErrorMessage({ type: 'AuthenticationFailed' })).toBe('Authentication failed. Please try again.');
      expect(signInErrorMessage({ type: 'DecodingError' })).toBe('Authentication failed. Please try again.');
    });
  });

  describe('continueAsGuest / startQuickStart', () => {
    it('should enter guest mode offline and report no persistence', async () => {
      const { api, machine, connectivity } = setup({ settings: { user_profile: BIRTH_DATE_ONLY } });
      api.healthCheck.mockResolvedValue(err({ type: 'Offline' }));
      await machine.initialize().background;

      const mode = machine.continueAsGuest();
      await connectivity.probe();

      expect(mode).toBe('SignedIn');
      expect(machine.getSnapshot().connectivity.connected).toBe(false);
      expect(machine.capabilities().canPersist).toBe(false);
      expect(machine.capabilities().dailyQuota).toBe(1);
    });

    it('should persist the flag and need profile setup without a birth date', () => {
      const { api, machine, settings } = setup();

      const mode = machine.continueAsGuest();

      expect(mode).toBe('NeedsProfileSetup');
      expect(settings.getTierFlags()).toEqual({ isAnonymousUser: true, isQuickStartUser: false });
      expect(settings.hasSignedIn()).toBe(true);
      expect(api.healthCheck).toHaveBeenCalledTimes(1);
    });

    it('should switch from guest to quick start', () => {
      const { machine, settings } = setup({ settings: { user_profile: BIRTH_DATE_ONLY } });

      machine.continueAsGuest();
      machine.startQuickStart();

      expect(settings.getTierFlags()).toEqual({ isAnonymousUser: false, isQuickStartUser: true });
      expect(machine.getSnapshot().tier).toBe('QuickStart');
    });
  });

  describe('completeProfileSetup', () => {
    it('should reject completion while signed out', async () => {
      const { machine } = setup();
      machine.initialize();

      const result = await machine.completeProfileSetup(BIRTH_DATE_ONLY);

      expect(result).toEqual({
        ok: false,
        error: {
          type: 'InvalidTransition',
          from: 'SignedOut',
          to: 'SignedIn',
          message: 'Cannot complete profile setup from SignedOut',
        },
      });
      expect(machine.getSnapshot().mode).toBe('SignedOut');
    });

    it('should save the profile, mark onboarding complete and sign in', async () => {
      const { api, machine, settings } = setup();
      machine.continueAsGuest();

      const result = await machine.completeProfileSetup(FULL_PROFILE);

      expect(result).toEqual({ ok: true, value: undefined });
      expect(machine.getSnapshot().mode).toBe('SignedIn');
      expect(settings.getProfile()).toEqual(FULL_PROFILE);
      expect(settings.hasCompletedOnboarding()).toBe(true);
      expect(api.syncBirthData).toHaveBeenCalledWith(
        expect.stringMatching(/^device-/),
        expect.objectContaining({ date: '1990-04-12' }),
        expect.any(AbortSignal)
      );
    });

    it('should sign in even when the remote sync fails', async () => {
      const { api, machine } = setup();
      machine.continueAsGuest();
      api.syncBirthData.mockResolvedValueOnce(
        err({ type: 'MaxRetriesExceeded', message: 'Server error: 503', retriesAttempted: 3, lastError: { type: 'ServerError', code: 503 } })
      );

      const result = await machine.completeProfileSetup(FULL_PROFILE);

      expect(result.ok).toBe(true);
      expect(machine.getSnapshot().mode).toBe('SignedIn');
    });

    it('should come back SignedIn after a restart when setup finished without a birth date', async () => {
      const first = setup();
      first.machine.continueAsGuest();
      await first.machine.completeProfileSetup();
      expect(first.machine.getSnapshot().mode).toBe('SignedIn');

      const restarted = setup({ storage: first.storage });

      expect(restarted.machine.initialize().mode).toBe('SignedIn');
      expect(restarted.machine.getSnapshot().tier).toBe('Guest');
    });

    it('should cancel the sync on sign-out', async () => {
      const { api, machine } = setup();
      machine.continueAsGuest();
      api.syncBirthData.mockImplementationOnce(
        (_userId: string, _payload: unknown, signal: AbortSignal) =>
          new Promise(resolve => {
            signal.addEventListener('abort', () => resolve(err({ type: 'Offline' })));
          })
      );

      const pending = machine.completeProfileSetup(FULL_PROFILE);
      machine.signOut();
      const result = await pending;

      expect(result.ok).toBe(true);
      const signal: AbortSignal = api.syncBirthData.mock.calls[0][2];
      expect(signal.aborted).toBe(true);
      expect(machine.getSnapshot().mode).toBe('SignedOut');
    });
  });

  describe('signOut', () => {
    it('should always end SignedOut with no credential, however often it is called', async () => {
      for (const times of [1, 2, 5]) {
        const { api, machine, tokenStore, settings } = setup({
          token: 'cached-token',
          settings: { user_profile: BIRTH_DATE_ONLY, is_quick_start_user: true, has_signed_in: true },
        });
        await machine.initialize().background;

        for (let i = 0; i < times; i++) {
          machine.signOut();
        }

        const snapshot = machine.getSnapshot();
        expect(snapshot.mode).toBe('SignedOut');
        expect(snapshot.session).toEqual({ bearerToken: null, user: null });
        expect(snapshot.tier).toBeNull();
        expect(tokenStore.get()).toBeNull();
        expect(settings.getTierFlags()).toEqual({ isAnonymousUser: false, isQuickStartUser: false });
        expect(settings.hasSignedIn()).toBe(false);
        expect(api.logout).toHaveBeenCalledTimes(1);
        expect(api.logout).toHaveBeenCalledWith('cached-token');
      }
    });

    it('should not call the server when there was no token', () => {
      const { api, machine } = setup();

      machine.signOut();

      expect(api.logout).not.toHaveBeenCalled();
      expect(machine.getSnapshot().mode).toBe('SignedOut');
    });

    it('should sign out locally even when the server logout fails', async () => {
      const { api, machine } = setup({ token: 'cached-token' });
      api.logout.mockResolvedValueOnce(err({ type: 'Offline' }));
      await machine.initialize().background;

      machine.signOut();
      await Promise.resolve();

      expect(machine.getSnapshot().mode).toBe('SignedOut');
    });
  });

  describe('handleTokenExpiry', () => {
    it('should share one refresh between concurrent triggers', async () => {
      const { api, machine, tokenStore, tokenExpired } = setup({
        token: 'cached-token',
        settings: { user_profile: BIRTH_DATE_ONLY },
      });
      await machine.initialize().background;
      const response = deferred<Result<AuthResponse, NetworkError>>();
      api.refreshToken.mockReturnValueOnce(response.promise);

      const first = machine.handleTokenExpiry();
      tokenExpired.emit();
      tokenExpired.emit();
      const second = machine.handleTokenExpiry();

      expect(second).toBe(first);
      expect(api.refreshToken).toHaveBeenCalledTimes(1);
      expect(api.refreshToken).toHaveBeenCalledWith('cached-token');

      response.resolve(ok({ jwtToken: 'refreshed-jwt', user: { id: 'user-1' } }));

      expect(await first).toBe('Refreshed');
      expect(tokenStore.get()).toBe('refreshed-jwt');
      expect(machine.getSnapshot().session.bearerToken).toBe('refreshed-jwt');
      expect(machine.getSnapshot().mode).toBe('SignedIn');
    });

    it('should start a new refresh once the previous one finished', async () => {
      const { api, machine } = setup({ token: 'cached-token', settings: { user_profile: BIRTH_DATE_ONLY } });
      await machine.initialize().background;

      await machine.handleTokenExpiry();
      await machine.handleTokenExpiry();

      expect(api.refreshToken).toHaveBeenCalledTimes(2);
      expect(api.refreshToken).toHaveBeenNthCalledWith(2, 'refreshed-jwt');
    });

    it('should sign out with the session-expired message when the refresh fails', async () => {
      const { api, machine, tokenStore } = setup({ token: 'cached-token', settings: { user_profile: BIRTH_DATE_ONLY } });
      await machine.initialize().background;
      api.refreshToken.mockResolvedValueOnce(err({ type: 'AuthenticationFailed', message: 'revoked' }));

      const outcome = await machine.handleTokenExpiry();

      expect(outcome).toBe('SignedOut');
      expect(machine.getSnapshot().mode).toBe('SignedOut');
      expect(machine.getSnapshot().authError).toBe(SESSION_EXPIRED_MESSAGE);
      expect(tokenStore.get()).toBeNull();
      expect(api.logout).toHaveBeenCalledWith('cached-token');
    });

    it('should drop a refresh that completes after sign-out', async () => {
      const { api, machine, tokenStore } = setup({ token: 'cached-token', settings: { user_profile: BIRTH_DATE_ONLY } });
      await machine.initialize().background;
      const response = deferred<Result<AuthResponse, NetworkError>>();
      api.refreshToken.mockReturnValueOnce(response.promise);

      const pending = machine.handleTokenExpiry();
      machine.signOut();
      response.resolve(ok({ jwtToken: 'refreshed-jwt', user: { id: 'user-1' } }));

      expect(await pending).toBe('Superseded');
      expect(tokenStore.get()).toBeNull();
      expect(machine.getSnapshot().session.bearerToken).toBeNull();
    });

    it('should not sign out a user whose sign-in finished while the previous token was refreshing', async () => {
      const { api, machine, tokenStore } = setup({ token: 'old-jwt', settings: { user_profile: BIRTH_DATE_ONLY } });
      await machine.initialize().background;
      const signIn = deferred<Result<AuthResponse, NetworkError>>();
      const refresh = deferred<Result<AuthResponse, NetworkError>>();
      api.authenticateWithApple.mockReturnValueOnce(signIn.promise);
      api.refreshToken.mockReturnValueOnce(refresh.promise);

      const pendingSignIn = machine.signInWithExternalIdentity(ASSERTION);
      const pendingExpiry = machine.handleTokenExpiry();
      signIn.resolve(ok({ jwtToken: 'new-jwt', user: { id: 'user-2' } }));
      await pendingSignIn;
      refresh.resolve(err({ type: 'AuthenticationFailed' }));

      expect(api.refreshToken).toHaveBeenCalledWith('old-jwt');
      expect(await pendingExpiry).toBe('Superseded');
      expect(machine.getSnapshot().mode).toBe('SignedIn');
      expect(machine.getSnapshot().session.bearerToken).toBe('new-jwt');
      expect(machine.getSnapshot().authError).toBeNull();
      expect(tokenStore.get()).toBe('new-jwt');
      expect(api.logout).not.toHaveBeenCalled();
    });

    it('should not replace a new sign-in with the refreshed previous session', async () => {
      const { api, machine, tokenStore } = setup({ token: 'old-jwt', settings: { user_profile: BIRTH_DATE_ONLY } });
      await machine.initialize().background;
      const signIn = deferred<Result<AuthResponse, NetworkError>>();
      const refresh = deferred<Result<AuthResponse, NetworkError>>();
      api.authenticateWithApple.mockReturnValueOnce(signIn.promise);
      api.refreshToken.mockReturnValueOnce(refresh.promise);

      const pendingSignIn = machine.signInWithExternalIdentity(ASSERTION);
      const pendingExpiry = machine.handleTokenExpiry();
      signIn.resolve(ok({ jwtToken: 'new-jwt', user: { id: 'user-2' } }));
      await pendingSignIn;
      refresh.resolve(ok({ jwtToken: 'refreshed-old', user: { id: 'user-1' } }));

      expect(await pendingExpiry).toBe('Superseded');
      expect(machine.getSnapshot().session).toEqual({ bearerToken: 'new-jwt', user: { id: 'user-2' } });
      expect(tokenStore.get()).toBe('new-jwt');
    });

    it('should report NoSession without a token', async () => {
      const { api, machine } = setup();

      expect(await machine.handleTokenExpiry()).toBe('NoSession');
      expect(api.refreshToken).not.toHaveBeenCalled();
    });
  });

  describe('retryConnection', () => {
    it('should probe after the delay without touching the mode', async () => {
      vi.useFakeTimers();
      const { api, machine } = setup({ token: 'cached-token', settings: { user_profile: BIRTH_DATE_ONLY } });
      await machine.initialize().background;
      api.healthCheck.mockClear();
      api.healthCheck.mockResolvedValue(err({ type: 'Offline' }));

      const pending = machine.retryConnection();
      expect(machine.getSnapshot().isRetryingConnection).toBe(true);
      await vi.advanceTimersByTimeAsync(1999);
      expect(api.healthCheck).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      const status = await pending;

      expect(status).toEqual({
        connected: false,
        lastError: 'Offline',
        message: 'Offline mode - some features may be limited',
        checkedAt: 1000,
      });
      expect(api.healthCheck).toHaveBeenCalledTimes(1);
      expect(machine.getSnapshot().isRetryingConnection).toBe(false);
      expect(machine.getSnapshot().mode).toBe('SignedIn');
    });

    it('should restart the delay on a newer call and share the single probe', async () => {
      vi.useFakeTimers();
      const { api, machine } = setup();

      const first = machine.retryConnection();
      await vi.advanceTimersByTimeAsync(1500);
      const second = machine.retryConnection();
      await vi.advanceTimersByTimeAsync(1500);
      expect(api.healthCheck).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(500);

      expect(api.healthCheck).toHaveBeenCalledTimes(1);
      expect(await second).toBe(await first);
      expect(machine.getSnapshot().connectivity.connected).toBe(true);
    });
  });

  describe('subscribe / dispose', () => {
    it('should notify subscribers with new snapshots until they unsubscribe', () => {
      const { machine } = setup();
      const listener = vi.fn();
      const unsubscribe = machine.subscribe(listener);

      machine.initialize();
      unsubscribe();
      machine.continueAsGuest();

      expect(listener.mock.calls[0][0].mode).toBe('SignedOut');
      expect(listener.mock.calls.every(call => call[0].tier === null)).toBe(true);
    });

    it('should stop polling and ignore expiry events after dispose', async () => {
      vi.useFakeTimers();
      const { api, machine, tokenExpired } = setup({
        token: 'cached-token',
        settings: { user_profile: BIRTH_DATE_ONLY },
        connectivityPollMs: 1000,
      });
      await machine.initialize().background;

      machine.dispose();
      await vi.advanceTimersByTimeAsync(5000);
      tokenExpired.emit();

      expect(api.healthCheck).toHaveBeenCalledTimes(1);
      expect(api.refreshToken).not.toHaveBeenCalled();
    });
  });
});
