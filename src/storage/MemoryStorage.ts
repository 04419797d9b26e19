/**
 * In-process key-value storage, used by tests and ephemeral sessions.
 */

import { ok, type Result } from '../types/Result';
import type { StorageWriteError } from '../types/StorageTypes';
import type { IKeyValueStorage } from './IKeyValueStorage';

export class MemoryStorage implements IKeyValueStorage {
  private readonly items = new Map<string, unknown>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.items.set(key, value);
    }
  }

  get(key: string): unknown {
    return this.items.get(key);
  }

  set(key: string, value: unknown): Result<void, StorageWriteError> {
    this.items.set(key, value);
    return ok(undefined);
  }

  remove(key: string): Result<void, StorageWriteError> {
    this.items.delete(key);
    return ok(undefined);
  }
}
