import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { makeCodepaneError, type ChatMessage } from '@codepane/shared-types';
import { z } from 'zod';

const historySchema = z.array(
  z.object({
    role: z.enum(['system', 'user', 'assistant']),
    content: z.string(),
  }),
);

export const DEFAULT_HISTORY_LIST_LIMIT = 15;

export interface HistoryStore {
  /** Writes the conversation and returns the filename it was stored under. */
  save(messages: ChatMessage[], filename?: string): Promise<string>;
  load(filename: string): Promise<ChatMessage[]>;
  /** Filenames, most recently modified first. */
  list(limit?: number): Promise<string[]>;
  remove(filename: string): Promise<boolean>;
  clearAll(): Promise<number>;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function autosaveFilename(at: Date = new Date()): string {
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `autosave_${date}-${time}.json`;
}

export function normalizeHistoryFilename(filename: string): string {
  const trimmed = filename.trim();
  if (!trimmed || trimmed !== path.basename(trimmed) || trimmed.startsWith('.')) {
    throw makeCodepaneError(`Invalid history filename: ${filename}`, 'persistence', false);
  }
  return trimmed.endsWith('.json') ? trimmed : `${trimmed}.json`;
}

function isMissing(error: unknown): boolean {
  return (error as NodeJS.ErrnoException | undefined)?.code === 'ENOENT';
}

export function createFileHistoryStore(dir: string, now: () => Date = () => new Date()): HistoryStore {
  const resolve = (filename: string): string => path.join(dir, normalizeHistoryFilename(filename));

  return {
    async save(messages, filename) {
      const name = normalizeHistoryFilename(filename ?? autosaveFilename(now()));
      const target = path.join(dir, name);
      const tmp = path.join(dir, `.${name}.tmp.${process.pid}.${crypto.randomBytes(6).toString('hex')}`);
      try {
        await fs.mkdir(dir, { recursive: true });
        await fs.writeFile(tmp, `${JSON.stringify(messages, null, 2)}\n`, 'utf8');
        await fs.rename(tmp, target);
      } catch (error) {
        throw makeCodepaneError(`Failed to save history ${name}: ${(error as Error).message}`, 'persistence', false);
      }
      return name;
    },

    async load(filename) {
      let raw: string;
      try {
        raw = await fs.readFile(resolve(filename), 'utf8');
      } catch (error) {
        throw makeCodepaneError(`Failed to read history ${filename}: ${(error as Error).message}`, 'persistence', false);
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        throw makeCodepaneError(`History ${filename} is not valid JSON: ${(error as Error).message}`, 'persistence', false);
      }

      const result = historySchema.safeParse(parsed);
      if (!result.success) {
        throw makeCodepaneError(`History ${filename} has an unexpected shape`, 'persistence', false);
      }
      return result.data;
    },

    async list(limit = DEFAULT_HISTORY_LIST_LIMIT) {
      let names: string[];
      try {
        names = await fs.readdir(dir);
      } catch (error) {
        if (isMissing(error)) return [];
        throw makeCodepaneError(`Failed to list history: ${(error as Error).message}`, 'persistence', false);
      }

      const files = await Promise.all(
        names
          .filter((name) => name.endsWith('.json') && !name.startsWith('.'))
          .map(async (name) => ({ name, mtimeMs: (await fs.stat(path.join(dir, name))).mtimeMs })),
      );
      return files
        .sort((a, b) => b.mtimeMs - a.mtimeMs || b.name.localeCompare(a.name))
        .slice(0, limit)
        .map((file) => file.name);
    },

    async remove(filename) {
      try {
        await fs.unlink(resolve(filename));
        return true;
      } catch (error) {
        if (isMissing(error)) return false;
        throw makeCodepaneError(`Failed to delete history ${filename}: ${(error as Error).message}`, 'persistence', false);
      }
    },

    async clearAll() {
      const files = await this.list(Number.POSITIVE_INFINITY);
      await Promise.all(files.map((name) => fs.unlink(path.join(dir, name))));
      return files.length;
    },
  };
}
