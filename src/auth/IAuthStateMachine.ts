/**
 * Auth state machine interface
 *
 * Responsibility: single owner of AuthMode and Session; every transition
 * Test strategy: in-memory token store and settings, mocked IApiServices
 */

import type { Result } from '@/types/Result';
import type {
  AuthMode,
  AuthSnapshot,
  ExternalIdentityAssertion,
  InvalidTransitionError,
  SessionValidity,
  SignInError,
  TokenExpiryOutcome,
} from '@/types/AuthTypes';
import type { ConnectivityStatus } from '@/types/ConnectivityTypes';
import type { UserProfile } from '@/types/ProfileTypes';
import type { FeatureSet } from '@/features/FeatureGate';
import type { Listener, Unsubscribe } from '@/events/EventChannel';

export type InitializeResult = {
  /** Decided from local state only */
  mode: AuthMode;
  /** Settles once the connectivity probe and session validation finish */
  background: Promise<void>;
};

export interface IAuthStateMachine {
  /**
   * Picks the first mode synchronously, then probes connectivity and validates
   * a stored token in the background. Later calls return the current mode.
   */
  initialize(): InitializeResult;

  /**
   * Exchanges the assertion for a session. On failure nothing changes.
   */
  signInWithExternalIdentity(assertion: ExternalIdentityAssertion): Promise<Result<AuthMode, SignInError>>;

  continueAsGuest(): AuthMode;
  startQuickStart(): AuthMode;

  /**
   * Allowed from NeedsProfileSetup or SignedIn. Resolves after the best-effort
   * remote sync; the mode is SignedIn whatever the sync outcome.
   */
  completeProfileSetup(profile?: UserProfile): Promise<Result<void, InvalidTransitionError>>;

  /** Unconditional and idempotent */
  signOut(): void;

  /** Concurrent calls share one refresh */
  handleTokenExpiry(): Promise<TokenExpiryOutcome>;

  /** Delayed, debounced connectivity probe; never changes AuthMode */
  retryConnection(): Promise<ConnectivityStatus>;

  /** null when there is no token to validate */
  validateSession(): Promise<SessionValidity | null>;

  getSnapshot(): AuthSnapshot;
  subscribe(listener: Listener<AuthSnapshot>): Unsubscribe;
  capabilities(): FeatureSet;
  dispose(): void;
}
