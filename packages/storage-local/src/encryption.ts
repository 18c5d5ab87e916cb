import crypto from 'node:crypto';
import { makeCodepaneError } from '@codepane/shared-types';
import type { KeyValueStore } from './key-value';

const KEY_STORAGE_KEY = 'codepane.encryption.key';
const ALGORITHM = 'aes-256-gcm';
const IV_BYTES = 12;
const TAG_BYTES = 16;

export interface EncryptionService {
  encrypt(plaintext: string): string;
  decrypt(ciphertext: string): string;
}

function loadOrCreateKey(storage: KeyValueStore): Buffer {
  const stored = storage.getItem(KEY_STORAGE_KEY);
  if (stored) {
    const key = Buffer.from(stored, 'base64');
    if (key.length === 32) {
      return key;
    }
    console.warn('[codepane][crypto] stored encryption key has the wrong length, generating a new one');
  }
  const key = crypto.randomBytes(32);
  storage.setItem(KEY_STORAGE_KEY, key.toString('base64'));
  return key;
}

/**
 * Symmetric encryption with a key generated on first use and kept in the given
 * store. Ciphertext is base64 of `iv | auth tag | encrypted bytes`.
 */
export function createEncryptionService(storage: KeyValueStore): EncryptionService {
  const key = loadOrCreateKey(storage);

  return {
    encrypt(plaintext) {
      const iv = crypto.randomBytes(IV_BYTES);
      const cipher = crypto.createCipheriv(ALGORITHM, key, iv);
      const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
      return Buffer.concat([iv, cipher.getAuthTag(), encrypted]).toString('base64');
    },
    decrypt(ciphertext) {
      const raw = Buffer.from(ciphertext, 'base64');
      if (raw.length < IV_BYTES + TAG_BYTES) {
        throw makeCodepaneError('Ciphertext is too short', 'credential', false);
      }
      try {
        const decipher = crypto.createDecipheriv(ALGORITHM, key, raw.subarray(0, IV_BYTES));
        decipher.setAuthTag(raw.subarray(IV_BYTES, IV_BYTES + TAG_BYTES));
        return Buffer.concat([decipher.update(raw.subarray(IV_BYTES + TAG_BYTES)), decipher.final()]).toString('utf8');
      } catch (error) {
        throw makeCodepaneError(`Failed to decrypt value: ${(error as Error).message}`, 'credential', false);
      }
    },
  };
}
