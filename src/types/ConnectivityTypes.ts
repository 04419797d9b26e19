/**
 * Connectivity Domain Types
 *
 * Connectivity is an axis independent of AuthMode: a signed-in user may be offline.
 */

import type { NetworkErrorKind } from './ApiTypes';

export type ConnectivityStatus = {
  connected: boolean;
  lastError: NetworkErrorKind | null;
  /** Short user-facing description of the last probe failure */
  message: string | null;
  /** Unix timestamp (ms) of the last completed probe */
  checkedAt: number | null;
};

export const INITIAL_CONNECTIVITY: ConnectivityStatus = {
  connected: false,
  lastError: null,
  message: null,
  checkedAt: null,
};
