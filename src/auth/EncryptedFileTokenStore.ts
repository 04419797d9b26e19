/**
 * Encrypted file token storage
 *
 * Responsibility: persist the bearer credential sealed with AES-256-GCM in a
 * file readable only by the current user (0600)
 */

import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { ok, err, type Result } from '../types/Result';
import type { StorageError } from '../types/AuthTypes';
import type { ISecureTokenStore } from './ISecureTokenStore';
import { seal, unseal, type KeyProvider } from './TokenCipher';

export class EncryptedFileTokenStore implements ISecureTokenStore {
  constructor(
    private readonly filePath: string,
    private readonly keyProvider: KeyProvider
  ) {}

  put(token: string): Result<void, StorageError> {
    if (token.length === 0) {
      return err({ type: 'WriteError', message: 'Refusing to store an empty token' });
    }

    const key = this.keyProvider();
    if (!key) {
      return err({ type: 'Locked', message: 'Secure storage is locked' });
    }

    const removed = this.delete();
    if (!removed.ok) {
      return err({ type: 'WriteError', message: removed.error.message });
    }

    try {
      mkdirSync(dirname(this.filePath), { recursive: true, mode: 0o700 });
      writeFileSync(this.filePath, seal(token, key), { encoding: 'utf8', mode: 0o600 });
      return ok(undefined);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err({ type: 'WriteError', message });
    }
  }

  get(): string | null {
    const key = this.keyProvider();
    if (!key) {
      return null;
    }

    let sealed: string;
    try {
      sealed = readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[EncryptedFileTokenStore] Failed to read token file: ${message}`);
      return null;
    }

    try {
      return unseal(sealed, key);
    } catch {
      console.warn('[EncryptedFileTokenStore] Stored token could not be decrypted, treating as absent');
      return null;
    }
  }

  delete(): Result<void, StorageError> {
    try {
      rmSync(this.filePath, { force: true });
      return ok(undefined);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err({ type: 'DeleteError', message });
    }
  }
}
