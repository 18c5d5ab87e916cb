import type { ChatMessage } from '@codepane/shared-types';

export interface ChatRequest {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  messages: ChatMessage[];
  /** Provider-specific body fields merged into the request as-is. */
  providerFlags?: Record<string, unknown>;
}

export interface ChatTransport {
  /**
   * Sends the request and resolves with the response body once the server has
   * answered with a success status. Rejects with a `CodepaneError`.
   */
  open(request: ChatRequest, signal?: AbortSignal): Promise<ReadableStream<Uint8Array>>;
}
