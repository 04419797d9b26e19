/**
 * In-memory token storage for tests and ephemeral sessions.
 */

import { ok, err, type Result } from '../types/Result';
import type { StorageError } from '../types/AuthTypes';
import type { ISecureTokenStore } from './ISecureTokenStore';

export class InMemoryTokenStore implements ISecureTokenStore {
  private token: string | null;

  constructor(initialToken: string | null = null) {
    this.token = initialToken;
  }

  put(token: string): Result<void, StorageError> {
    if (token.length === 0) {
      return err({ type: 'WriteError', message: 'Refusing to store an empty token' });
    }
    this.token = token;
    return ok(undefined);
  }

  get(): string | null {
    return this.token;
  }

  delete(): Result<void, StorageError> {
    this.token = null;
    return ok(undefined);
  }
}
