/**
 * Settings Manager
 *
 * Persists the non-secret local state of the session: the anonymous device
 * identifier, the "has signed in before" marker, the guest and quick-start
 * tier flags, the cached profile and the onboarding marker.
 *
 * Write failures are returned to the caller; reads fall back to defaults.
 */

import { v4 as uuidv4 } from 'uuid';
import { ok, type Result } from '@/types/Result';
import type { StorageWriteError } from '@/types/StorageTypes';
import { EMPTY_PROFILE, type UserProfile } from '@/types/ProfileTypes';
import type { IKeyValueStorage } from '@/storage/IKeyValueStorage';

export const SETTINGS_KEYS = {
  deviceUserId: 'device_user_id',
  hasSignedIn: 'has_signed_in',
  isAnonymousUser: 'is_anonymous_user',
  isQuickStartUser: 'is_quick_start_user',
  userProfile: 'user_profile',
  hasCompletedOnboarding: 'has_completed_onboarding',
} as const;

export type TierFlags = {
  isAnonymousUser: boolean;
  isQuickStartUser: boolean;
};

export interface ISettingsManager {
  getDeviceUserId(): string;
  hasSignedIn(): boolean;
  setHasSignedIn(value: boolean): Result<void, StorageWriteError>;
  getTierFlags(): TierFlags;
  setTierFlags(flags: TierFlags): Result<void, StorageWriteError>;
  getProfile(): UserProfile;
  saveProfile(profile: UserProfile): Result<void, StorageWriteError>;
  hasCompletedOnboarding(): boolean;
  setCompletedOnboarding(value: boolean): Result<void, StorageWriteError>;
  /** Clears tier flags and the has-signed-in marker (sign-out). */
  clearSessionFlags(): Result<void, StorageWriteError>;
}

export class SettingsManager implements ISettingsManager {
  private deviceUserId: string | null = null;

  constructor(private readonly storage: IKeyValueStorage) {}

  /**
   * Anonymous identifier sent as X-User-Id. Generated once; if it cannot be
   * persisted it is still stable for the lifetime of this instance.
   */
  getDeviceUserId(): string {
    if (this.deviceUserId) {
      return this.deviceUserId;
    }

    const stored = this.storage.get(SETTINGS_KEYS.deviceUserId);
    if (typeof stored === 'string' && stored.length > 0) {
      this.deviceUserId = stored;
      return stored;
    }

    const generated = `device-${uuidv4()}`;
    const result = this.storage.set(SETTINGS_KEYS.deviceUserId, generated);
    if (!result.ok) {
      console.warn(`[SettingsManager] Failed to persist device id: ${result.error.message}`);
    }
    this.deviceUserId = generated;
    return generated;
  }

  hasSignedIn(): boolean {
    return this.readBoolean(SETTINGS_KEYS.hasSignedIn);
  }

  setHasSignedIn(value: boolean): Result<void, StorageWriteError> {
    return this.storage.set(SETTINGS_KEYS.hasSignedIn, value);
  }

  getTierFlags(): TierFlags {
    return {
      isAnonymousUser: this.readBoolean(SETTINGS_KEYS.isAnonymousUser),
      isQuickStartUser: this.readBoolean(SETTINGS_KEYS.isQuickStartUser),
    };
  }

  setTierFlags(flags: TierFlags): Result<void, StorageWriteError> {
    const anonymous = this.storage.set(SETTINGS_KEYS.isAnonymousUser, flags.isAnonymousUser);
    if (!anonymous.ok) {
      return anonymous;
    }
    return this.storage.set(SETTINGS_KEYS.isQuickStartUser, flags.isQuickStartUser);
  }

  getProfile(): UserProfile {
    return parseProfile(this.storage.get(SETTINGS_KEYS.userProfile));
  }

  saveProfile(profile: UserProfile): Result<void, StorageWriteError> {
    return this.storage.set(SETTINGS_KEYS.userProfile, { ...profile });
  }

  hasCompletedOnboarding(): boolean {
    return this.readBoolean(SETTINGS_KEYS.hasCompletedOnboarding);
  }

  setCompletedOnboarding(value: boolean): Result<void, StorageWriteError> {
    return this.storage.set(SETTINGS_KEYS.hasCompletedOnboarding, value);
  }

  clearSessionFlags(): Result<void, StorageWriteError> {
    const keys = [
      SETTINGS_KEYS.isAnonymousUser,
      SETTINGS_KEYS.isQuickStartUser,
      SETTINGS_KEYS.hasSignedIn,
      SETTINGS_KEYS.hasCompletedOnboarding,
    ];
    for (const key of keys) {
      const result = this.storage.remove(key);
      if (!result.ok) {
        return result;
      }
    }
    return ok(undefined);
  }

  private readBoolean(key: string): boolean {
    return this.storage.get(key) === true;
  }
}

/**
 * Keeps only the fields with the expected primitive types; anything else in
 * the stored object is dropped.
 */
export function parseProfile(value: unknown): UserProfile {
  if (typeof value !== 'object' || value === null) {
    return { ...EMPTY_PROFILE };
  }

  const profile: UserProfile = {};
  const record = Object.fromEntries(Object.entries(value));

  for (const key of ['fullName', 'birthDate', 'birthTime', 'birthPlace', 'timezone'] as const) {
    const field: unknown = record[key];
    if (typeof field === 'string') {
      profile[key] = field;
    }
  }
  for (const key of ['birthLatitude', 'birthLongitude'] as const) {
    const field: unknown = record[key];
    if (typeof field === 'number' && Number.isFinite(field)) {
      profile[key] = field;
    }
  }
  return profile;
}
