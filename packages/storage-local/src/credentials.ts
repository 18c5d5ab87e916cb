import type { ApiCredential } from '@codepane/shared-types';
import type { EncryptionService } from './encryption';
import type { KeyValueStore } from './key-value';

const CREDENTIALS_KEY = 'codepane.credentials.v1';

export interface CredentialStore {
  /** Labels of every entry that still decrypts. */
  list(): string[];
  add(label: string, secret: string): void;
  remove(label: string): boolean;
  resolve(label: string): ApiCredential | null;
}

function readCiphertexts(storage: KeyValueStore): Record<string, string> {
  const raw = storage.getItem(CREDENTIALS_KEY);
  if (!raw) return {};
  try {
    const parsed = JSON.parse(raw) as unknown;
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return {};
    const output: Record<string, string> = {};
    for (const [label, value] of Object.entries(parsed)) {
      if (typeof value === 'string') output[label] = value;
    }
    return output;
  } catch {
    console.warn('[codepane][credentials] stored credential map is not valid JSON, ignoring it');
    return {};
  }
}

export function createCredentialStore(storage: KeyValueStore, encryption: EncryptionService): CredentialStore {
  const decryptEntry = (label: string, ciphertext: string): string | null => {
    try {
      return encryption.decrypt(ciphertext);
    } catch (error) {
      console.warn('[codepane][credentials] skipping entry that failed to decrypt', {
        label,
        reason: (error as Error).message,
      });
      return null;
    }
  };

  const write = (entries: Record<string, string>): void => {
    storage.setItem(CREDENTIALS_KEY, JSON.stringify(entries));
  };

  return {
    list() {
      return Object.entries(readCiphertexts(storage))
        .filter(([label, ciphertext]) => decryptEntry(label, ciphertext) !== null)
        .map(([label]) => label);
    },
    add(label, secret) {
      const name = label.trim();
      const value = secret.trim();
      if (!name || !value) {
        throw new Error('Credential label and secret must both be non-empty');
      }
      write({ ...readCiphertexts(storage), [name]: encryption.encrypt(value) });
    },
    remove(label) {
      const entries = readCiphertexts(storage);
      if (!(label in entries)) return false;
      delete entries[label];
      write(entries);
      return true;
    },
    resolve(label) {
      const ciphertext = readCiphertexts(storage)[label];
      if (ciphertext === undefined) return null;
      const secret = decryptEntry(label, ciphertext);
      return secret === null ? null : { label, secret };
    },
  };
}
