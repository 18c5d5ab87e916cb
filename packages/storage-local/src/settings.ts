import {
  DEFAULT_APP_SETTINGS,
  TOKEN_OPTIONS,
  type AppSettings,
  type ContinuationMode,
  type MaxTokens,
} from '@codepane/shared-types';
import type { KeyValueStore } from './key-value';

const STORAGE_KEY = 'codepane.settings.v1';

const MAX_HISTORY_WINDOW = 200;

function clampTemperature(value: number): number {
  if (Number.isNaN(value)) {
    return DEFAULT_APP_SETTINGS.temperature;
  }
  return Math.max(0, Math.min(2, value));
}

function isMaxTokens(value: unknown): value is MaxTokens {
  return TOKEN_OPTIONS.some((option) => option === value);
}

function isContinuationMode(value: unknown): value is ContinuationMode {
  return value === 'append' || value === 'merge';
}

function normalizeHistoryWindow(value: unknown, fallback: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    return fallback;
  }
  return Math.min(value, MAX_HISTORY_WINDOW);
}

export function validateSettings(input: Partial<AppSettings> | undefined): AppSettings {
  const base = DEFAULT_APP_SETTINGS;
  if (!input) {
    return base;
  }

  return {
    schemaVersion: 1,
    model: typeof input.model === 'string' && input.model.trim() ? input.model.trim() : base.model,
    temperature: clampTemperature(typeof input.temperature === 'number' ? input.temperature : base.temperature),
    maxTokens: isMaxTokens(input.maxTokens) ? input.maxTokens : base.maxTokens,
    freeOnly: typeof input.freeOnly === 'boolean' ? input.freeOnly : base.freeOnly,
    historyWindow: normalizeHistoryWindow(input.historyWindow, base.historyWindow),
    continuationMode: isContinuationMode(input.continuationMode) ? input.continuationMode : base.continuationMode,
    lastCredential: typeof input.lastCredential === 'string' ? input.lastCredential : base.lastCredential,
    responseLanguage:
      typeof input.responseLanguage === 'string' && input.responseLanguage.trim()
        ? input.responseLanguage.trim()
        : base.responseLanguage,
  };
}

export function loadSettings(storage: KeyValueStore): AppSettings {
  const raw = storage.getItem(STORAGE_KEY);
  if (!raw) {
    return DEFAULT_APP_SETTINGS;
  }

  try {
    const parsed = JSON.parse(raw) as Partial<AppSettings>;
    return validateSettings(parsed);
  } catch {
    return DEFAULT_APP_SETTINGS;
  }
}

export function saveSettings(patch: Partial<AppSettings>, storage: KeyValueStore): AppSettings {
  const current = loadSettings(storage);
  const merged = validateSettings({ ...current, ...patch });
  storage.setItem(STORAGE_KEY, JSON.stringify(merged));
  return merged;
}

export function resetSettings(storage: KeyValueStore): void {
  storage.removeItem(STORAGE_KEY);
}
