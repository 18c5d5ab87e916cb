export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export type Conversation = ChatMessage[];

export type SessionState = 'idle' | 'streaming' | 'truncated' | 'completed' | 'failed' | 'cancelled';

export type TerminalSessionState = Exclude<SessionState, 'idle' | 'streaming'>;

export type ContinuationMode = 'append' | 'merge';

export interface CodeBlock {
  language: string;
  code: string;
  /**
   * Offsets of the whole fence, closing backticks included, as `[start, end)`.
   * They index the text that was scanned: the answer itself, or for a continued
   * answer the previous answer joined with its continuation. In `append` mode
   * that joined text is not stored as a single message.
   */
  sourceSpan: [number, number];
}

export interface ApiCredential {
  label: string;
  secret: string;
}

export interface TurnTiming {
  startedAt: number;
  endedAt?: number;
  durationMs?: number;
}
