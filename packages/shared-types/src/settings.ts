import type { ContinuationMode } from './chat';

export const TOKEN_OPTIONS = [4096, 8192, 16384, 32768, 65536, 131072] as const;

export type MaxTokens = (typeof TOKEN_OPTIONS)[number];

export interface AppSettings {
  schemaVersion: 1;
  model: string;
  temperature: number;
  maxTokens: MaxTokens;
  freeOnly: boolean;
  /** Number of trailing history messages sent with each request. */
  historyWindow: number;
  continuationMode: ContinuationMode;
  lastCredential: string;
  /** Natural language the assistant is asked to answer in. */
  responseLanguage: string;
}

export const DEFAULT_APP_SETTINGS: AppSettings = {
  schemaVersion: 1,
  model: 'deepseek/deepseek-chat-v3-0324:free',
  temperature: 0.4,
  maxTokens: 32768,
  freeOnly: true,
  historyWindow: 15,
  continuationMode: 'append',
  lastCredential: '',
  responseLanguage: 'English',
};
