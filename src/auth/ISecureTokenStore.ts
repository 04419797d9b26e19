/**
 * Secure token storage interface
 *
 * Responsibility: one encrypted-at-rest slot for the bearer credential
 * Test strategy: fully replaceable with InMemoryTokenStore
 *
 * Implementations never log token contents.
 */

import type { Result } from '@/types/Result';
import type { StorageError } from '@/types/AuthTypes';

export interface ISecureTokenStore {
  /**
   * Replaces any stored credential (delete, then write).
   * A failure means the caller keeps the token in memory only.
   */
  put(token: string): Result<void, StorageError>;

  /**
   * Returns the stored credential, or null when absent, unreadable or locked.
   */
  get(): string | null;

  /**
   * Removes the slot. Succeeds when nothing is stored.
   */
  delete(): Result<void, StorageError>;
}
