import type { ChatMessage, CodeBlock, ContinuationMode, ConversationEvent } from '@codepane/shared-types';
import type { SessionOutcome, StreamingSession } from '../session/streaming-session';

export const DEFAULT_CONTINUATION_PROMPT = 'Continue the previous answer exactly where it stopped.';

export interface RequestParameters {
  model: string;
  temperature: number;
  maxTokens: number;
  providerFlags?: Record<string, unknown>;
}

/** The part of a history store the controller writes through. */
export interface ConversationHistoryWriter {
  save(messages: ChatMessage[], filename?: string): Promise<string>;
}

export interface ConversationControllerConfig {
  session: StreamingSession;
  systemPrompt: string;
  /** Plaintext key for the next request; read once per request and not kept. */
  resolveApiKey: () => string | null | Promise<string | null>;
  getParameters: () => RequestParameters;
  historyStore?: ConversationHistoryWriter;
  /** Trailing history messages sent along with each new message. */
  historyWindow?: number;
  continuationMode?: ContinuationMode;
  continuationPrompt?: string;
  now?: () => number;
}

export interface TurnResult extends SessionOutcome {
  continuation: boolean;
  newBlocks: CodeBlock[];
}

export interface ConversationController {
  send(text: string): Promise<TurnResult>;
  /** Asks the model to resume the previous, truncated answer. */
  continue(): Promise<TurnResult>;
  cancel(): void;
  clear(): void;
  /** Replaces the conversation with one read from the history store. */
  load(messages: ChatMessage[], filename?: string): void;
  saveAs(filename: string): Promise<string>;
  canContinue(): boolean;
  isBusy(): boolean;
  getMessages(): ChatMessage[];
  getCodeBlocks(): CodeBlock[];
  getHistoryFile(): string | null;
  /** Settles once the most recent history write has finished or failed. */
  whenPersisted(): Promise<void>;
  subscribe(listener: (event: ConversationEvent) => void): () => void;
}
