/**
 * Auth Domain Types
 */

import type { NetworkError } from './ApiTypes';
import type { ConnectivityStatus } from './ConnectivityTypes';

export type AuthMode = 'Loading' | 'SignedOut' | 'NeedsProfileSetup' | 'SignedIn';

export type UserTier = 'Guest' | 'QuickStart' | 'Authenticated';

export type AuthenticatedUser = {
  id: string;
  email?: string;
  displayName?: string;
};

export type Session = {
  bearerToken: string | null;
  user: AuthenticatedUser | null;
};

export type AuthResponse = {
  jwtToken: string;
  user: AuthenticatedUser;
};

/**
 * Identity assertion issued by the external provider (Sign in with Apple).
 */
export type ExternalIdentityAssertion = {
  idToken: string;
  userIdentifier: string;
  email?: string;
  firstName?: string;
  lastName?: string;
};

/**
 * Immutable view of the machine handed to subscribers.
 */
export type AuthSnapshot = {
  readonly mode: AuthMode;
  readonly session: Readonly<Session>;
  readonly tier: UserTier | null;
  readonly connectivity: Readonly<ConnectivityStatus>;
  /** User-facing message from the last failed authentication step */
  readonly authError: string | null;
  /** Soft "limited connectivity" signal */
  readonly connectionMessage: string | null;
  readonly isRetryingConnection: boolean;
};

export type SessionValidity =
  | { status: 'valid' }
  | { status: 'invalid'; reason: NetworkError }
  | { status: 'indeterminate'; reason: NetworkError };

export type TokenExpiryOutcome = 'Refreshed' | 'SignedOut' | 'Superseded' | 'NoSession';

export type SignInError =
  | { type: 'SignInFailed'; cause: NetworkError; message: string }
  | { type: 'Superseded'; message: string };

export type RefreshError =
  | { type: 'InvalidRefreshToken'; message: string }
  | { type: 'RefreshFailed'; message: string; cause: NetworkError };

export type InvalidTransitionError = {
  type: 'InvalidTransition';
  from: AuthMode;
  to: AuthMode;
  message: string;
};

export type StorageError = {
  type: 'Locked' | 'WriteError' | 'DeleteError';
  message: string;
};
