/**
 * Feature gate
 *
 * Pure mapping from (tier, connected) to what the user may do. Holds no state;
 * callers recompute on every tier or connectivity change.
 */

import type { UserTier } from '@/types/AuthTypes';

export type DailyQuota = number | 'unlimited';

export type FeatureSet = {
  readonly canGenerate: boolean;
  readonly canPersist: boolean;
  readonly canSyncAcrossDevices: boolean;
  readonly canAccessPremium: boolean;
  readonly hasUnlimitedAccess: boolean;
  readonly dailyQuota: DailyQuota;
};

const NO_ACCESS: FeatureSet = Object.freeze({
  canGenerate: false,
  canPersist: false,
  canSyncAcrossDevices: false,
  canAccessPremium: false,
  hasUnlimitedAccess: false,
  dailyQuota: 0,
});

export function capabilities(tier: UserTier | null, connected: boolean): FeatureSet {
  switch (tier) {
    case 'Guest':
      return Object.freeze({ ...NO_ACCESS, canGenerate: connected, dailyQuota: connected ? 3 : 1 });
    case 'QuickStart':
      return Object.freeze({ ...NO_ACCESS, canGenerate: connected, dailyQuota: connected ? 5 : 2 });
    case 'Authenticated':
      return Object.freeze({
        canGenerate: connected,
        canPersist: connected,
        canSyncAcrossDevices: connected,
        canAccessPremium: connected,
        hasUnlimitedAccess: true,
        dailyQuota: 'unlimited',
      });
    case null:
      return NO_ACCESS;
  }
}

export function statusMessage(features: FeatureSet): string {
  if (!features.canGenerate) {
    return 'Sign in or connect to internet to access features';
  }
  if (!features.canPersist) {
    return "Guest mode - data won't be saved across devices";
  }
  if (!features.canAccessPremium) {
    return 'Limited connectivity - some features unavailable';
  }
  return 'Full access available';
}
