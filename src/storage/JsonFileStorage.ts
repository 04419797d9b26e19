/**
 * JSON file backed key-value storage
 *
 * Responsibility: persist non-secret local settings in a single JSON document
 *
 * The whole document is cached after the first read and rewritten on every
 * change. A missing or corrupt file reads as empty.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { ok, err, type Result } from '../types/Result';
import type { StorageWriteError } from '../types/StorageTypes';
import type { IKeyValueStorage } from './IKeyValueStorage';

export class JsonFileStorage implements IKeyValueStorage {
  private cache: Record<string, unknown> | null = null;

  constructor(private readonly filePath: string) {}

  get(key: string): unknown {
    return this.load()[key];
  }

  set(key: string, value: unknown): Result<void, StorageWriteError> {
    return this.write({ ...this.load(), [key]: value });
  }

  remove(key: string): Result<void, StorageWriteError> {
    const current = this.load();
    if (!(key in current)) {
      return ok(undefined);
    }
    const next = { ...current };
    delete next[key];
    return this.write(next);
  }

  private load(): Record<string, unknown> {
    if (this.cache) {
      return this.cache;
    }

    this.cache = {};
    try {
      const parsed: unknown = JSON.parse(readFileSync(this.filePath, 'utf8'));
      if (isRecord(parsed)) {
        this.cache = parsed;
      } else {
        console.warn(`[JsonFileStorage] Ignoring non-object settings file: ${this.filePath}`);
      }
    } catch (error) {
      if (!isMissingFile(error)) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[JsonFileStorage] Failed to read ${this.filePath}: ${message}`);
      }
    }
    return this.cache;
  }

  private write(next: Record<string, unknown>): Result<void, StorageWriteError> {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, JSON.stringify(next, null, 2), 'utf8');
      this.cache = next;
      return ok(undefined);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err({
        type: message.includes('ENOSPC') ? 'StorageQuotaExceeded' : 'StorageWriteFailed',
        message,
      });
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
