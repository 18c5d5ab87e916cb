import { makeCodepaneError } from '@codepane/shared-types';
import type { ChatRequest } from '../contracts';
import { makeTransportError, mapHttpStatusToError } from './errors';

export const DEFAULT_OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export interface OpenRouterClientConfig {
  baseUrl?: string;
  extraHeaders?: Record<string, string>;
  fetch?: typeof fetch;
}

function logModelInput(body: Record<string, unknown>, request: ChatRequest): void {
  const messages = request.messages;
  console.info('[codepane][llm] model_input', {
    model: body.model,
    temperature: body.temperature,
    maxTokens: body.max_tokens,
    systemPrompt: messages.find((message) => message.role === 'system')?.content.slice(0, 80) ?? '',
    messageCount: messages.length,
    lastRole: messages[messages.length - 1]?.role,
  });
}

export function buildBody(request: ChatRequest): Record<string, unknown> {
  return {
    ...request.providerFlags,
    model: request.model,
    messages: request.messages.map((message) => ({ role: message.role, content: message.content })),
    temperature: request.temperature,
    max_tokens: request.maxTokens,
    stream: true,
  };
}

export async function openRouterStream(
  config: OpenRouterClientConfig,
  request: ChatRequest,
  signal?: AbortSignal,
): Promise<ReadableStream<Uint8Array>> {
  const url = `${config.baseUrl ?? DEFAULT_OPENROUTER_BASE_URL}/chat/completions`;
  const body = buildBody(request);
  const fetchImpl = config.fetch ?? fetch;

  logModelInput(body, request);

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'POST',
      signal,
      headers: {
        ...config.extraHeaders,
        'content-type': 'application/json',
        authorization: `Bearer ${request.apiKey}`,
      },
      body: JSON.stringify(body),
    });
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    throw makeTransportError(error);
  }

  if (!response.ok) {
    throw mapHttpStatusToError(response.status, await response.text());
  }

  if (!response.body) {
    throw makeCodepaneError('OpenRouter response body is empty', 'transport', false);
  }

  return response.body;
}
