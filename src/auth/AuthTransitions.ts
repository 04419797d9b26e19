/**
 * AuthMode transition rules and mode resolution.
 */

import { ok, err, type Result } from '../types/Result';
import type { AuthMode, InvalidTransitionError, UserTier } from '../types/AuthTypes';
import { hasMinimalProfileData, type UserProfile } from '../types/ProfileTypes';
import type { TierFlags } from '../settings/SettingsManager';

const VALID_TRANSITIONS: Record<AuthMode, AuthMode[]> = {
  Loading: ['SignedOut', 'NeedsProfileSetup', 'SignedIn'],
  SignedOut: ['NeedsProfileSetup', 'SignedIn'],
  NeedsProfileSetup: ['SignedOut', 'SignedIn'],
  SignedIn: ['SignedOut', 'NeedsProfileSetup'],
};

/**
 * A transition to the current mode succeeds without effect.
 */
export function checkTransition(from: AuthMode, to: AuthMode): Result<void, InvalidTransitionError> {
  if (from === to || VALID_TRANSITIONS[from].includes(to)) {
    return ok(undefined);
  }
  return err({
    type: 'InvalidTransition',
    from,
    to,
    message: `Invalid transition: ${from} -> ${to}`,
  });
}

export type ModeInputs = {
  hasToken: boolean;
  flags: TierFlags;
  hasSignedIn: boolean;
  profile: UserProfile;
  onboardingCompleted: boolean;
};

/**
 * Nothing that marks a prior session => SignedOut. Otherwise a cached birth date
 * or a completed onboarding means SignedIn. A guest or quick-start flag counts as
 * a prior session on its own, so such a user resolves to SignedIn without any
 * credential.
 */
export function resolveAuthMode(inputs: ModeInputs): Exclude<AuthMode, 'Loading'> {
  const { hasToken, flags, hasSignedIn, profile, onboardingCompleted } = inputs;
  if (!hasToken && !flags.isAnonymousUser && !flags.isQuickStartUser && !hasSignedIn) {
    return 'SignedOut';
  }
  return hasMinimalProfileData(profile) || onboardingCompleted ? 'SignedIn' : 'NeedsProfileSetup';
}

/**
 * Quick-start wins over guest, and both win over a credential.
 */
export function deriveTier(flags: TierFlags, hasToken: boolean): UserTier | null {
  if (flags.isQuickStartUser) {
    return 'QuickStart';
  }
  if (flags.isAnonymousUser) {
    return 'Guest';
  }
  return hasToken ? 'Authenticated' : null;
}
