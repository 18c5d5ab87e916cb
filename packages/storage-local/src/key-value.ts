import fs from 'node:fs';
import path from 'node:path';
import { makeCodepaneError } from '@codepane/shared-types';

/** The subset of the Web Storage API the settings and credential stores use. */
export interface KeyValueStore {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export function createMemoryStore(initial: Record<string, string> = {}): KeyValueStore {
  const values = new Map(Object.entries(initial));
  return {
    getItem: (key) => values.get(key) ?? null,
    setItem: (key, value) => {
      values.set(key, value);
    },
    removeItem: (key) => {
      values.delete(key);
    },
  };
}

function readEntries(filePath: string): Record<string, string> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return {};
    throw error;
  }

  try {
    const parsed = JSON.parse(raw) as unknown;
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      return {};
    }
    const entries: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') entries[key] = value;
    }
    return entries;
  } catch {
    console.warn('[codepane][storage] settings file is not valid JSON, starting empty', { filePath });
    return {};
  }
}

/**
 * A JSON-file backed store. The whole file is read once and rewritten on every
 * change, so it suits small settings documents only.
 */
export function createJsonFileStore(filePath: string): KeyValueStore {
  const entries = readEntries(filePath);

  const flush = (): void => {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      const tmp = `${filePath}.tmp.${process.pid}`;
      fs.writeFileSync(tmp, `${JSON.stringify(entries, null, 2)}\n`, 'utf8');
      fs.renameSync(tmp, filePath);
    } catch (error) {
      throw makeCodepaneError(`Failed to write settings: ${(error as Error).message}`, 'persistence', false);
    }
  };

  return {
    getItem: (key) => entries[key] ?? null,
    setItem: (key, value) => {
      entries[key] = value;
      flush();
    },
    removeItem: (key) => {
      if (!(key in entries)) return;
      delete entries[key];
      flush();
    },
  };
}
