/**
 * Profile Domain Types
 *
 * Only the fields the session core needs to decide AuthMode and to sync
 * birth data. Dates are ISO 8601 strings.
 */

export interface UserProfile {
  fullName?: string;
  /** YYYY-MM-DD */
  birthDate?: string;
  /** HH:mm (local time at birth place) */
  birthTime?: string;
  birthPlace?: string;
  birthLatitude?: number;
  birthLongitude?: number;
  timezone?: string;
}

export const EMPTY_PROFILE: UserProfile = {};

/** Birth date alone is enough to unlock core features. */
export function hasMinimalProfileData(profile: UserProfile): boolean {
  return isPresent(profile.birthDate);
}

/** Everything the server needs for birth-data dependent features */
export function hasCompleteLocationData(profile: UserProfile): boolean {
  return (
    isPresent(profile.birthPlace) &&
    typeof profile.birthLatitude === 'number' &&
    typeof profile.birthLongitude === 'number' &&
    isPresent(profile.timezone)
  );
}

function isPresent(value: string | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}
