/**
 * Local key-value storage interface
 *
 * Responsibility: synchronous persistence of small, non-secret values
 * Test strategy: fully replaceable with MemoryStorage
 *
 * Reads never fail: unreadable or missing data is reported as undefined.
 */

import type { Result } from '@/types/Result';
import type { StorageWriteError } from '@/types/StorageTypes';

export interface IKeyValueStorage {
  get(key: string): unknown;
  set(key: string, value: unknown): Result<void, StorageWriteError>;
  remove(key: string): Result<void, StorageWriteError>;
}
