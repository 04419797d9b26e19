/**
 * AES-256-GCM sealing for the stored bearer credential.
 *
 * Sealed format (base64): iv (12) | auth tag (16) | ciphertext
 */

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const AAD = Buffer.from('astro-session:bearer-token', 'utf8');
const KDF_SALT = 'astro-session-token';

/**
 * Supplies the encryption key, or null while the device is locked.
 */
export type KeyProvider = () => Buffer | null;

/**
 * Accepts either `base64:<32 raw bytes>` or a passphrase run through scrypt.
 * Throws on a base64 key of the wrong length, which is a configuration error.
 */
export function deriveKey(keyString: string): Buffer {
  if (keyString.startsWith('base64:')) {
    const key = Buffer.from(keyString.slice('base64:'.length), 'base64');
    if (key.length !== KEY_LENGTH) {
      throw new Error(`Token key must decode to ${KEY_LENGTH} bytes, got ${key.length}`);
    }
    return key;
  }
  return scryptSync(keyString, KDF_SALT, KEY_LENGTH);
}

export function generateKeyString(): string {
  return 'base64:' + randomBytes(KEY_LENGTH).toString('base64');
}

/**
 * Key provider for a fixed key string; null keeps the store locked.
 */
export function staticKeyProvider(keyString: string | null): KeyProvider {
  const key = keyString === null ? null : deriveKey(keyString);
  return () => key;
}

export function seal(plaintext: string, key: Buffer): string {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  cipher.setAAD(AAD);
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  return Buffer.concat([iv, cipher.getAuthTag(), encrypted]).toString('base64');
}

/**
 * Throws when the payload is truncated, tampered with, or sealed with another key.
 */
export function unseal(sealed: string, key: Buffer): string {
  const buf = Buffer.from(sealed.trim(), 'base64');
  if (buf.length <= IV_LENGTH + AUTH_TAG_LENGTH) {
    throw new Error('Sealed token is truncated');
  }
  const iv = buf.subarray(0, IV_LENGTH);
  const authTag = buf.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
  const ciphertext = buf.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

  const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  decipher.setAAD(AAD);
  decipher.setAuthTag(authTag);
  return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
}
