import { AIMessage, HumanMessage, SystemMessage, type MessageContent } from '@langchain/core/messages';
import { FakeListChatModel } from '@langchain/core/utils/testing';
import type { ChatMessage } from '@codepane/shared-types';
import type { ChatRequest, ChatTransport } from '../contracts';
import { makeTransportError, mapHttpStatusToError } from '../openrouter/errors';
import { wait } from '../../session/retry';
import type { FakeScenario, FakeScenarioStep } from './scenario';

const HANG_MS = 24 * 60 * 60 * 1000;

function toLcMessage(message: ChatMessage): HumanMessage | SystemMessage | AIMessage {
  if (message.role === 'assistant') {
    return new AIMessage(message.content);
  }
  if (message.role === 'system') {
    return new SystemMessage(message.content);
  }
  return new HumanMessage(message.content);
}

function extractText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content.map((part) => ('text' in part && typeof part.text === 'string' ? part.text : '')).join('');
}

function frame(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

function sliceBytes(bytes: Uint8Array, chunkSize?: number): Uint8Array[] {
  if (!chunkSize || chunkSize <= 0 || bytes.length <= chunkSize) {
    return [bytes];
  }
  const slices: Uint8Array[] = [];
  for (let offset = 0; offset < bytes.length; offset += chunkSize) {
    slices.push(bytes.slice(offset, offset + chunkSize));
  }
  return slices;
}

async function* renderFrames(step: FakeScenarioStep, request: ChatRequest, signal?: AbortSignal): AsyncGenerator<string> {
  yield ': OPENROUTER PROCESSING\n\n';

  const response = step.response ?? '';
  if (response) {
    const model = new FakeListChatModel({ responses: [response], sleep: step.tokenDelayMs });
    const stream = await model.stream(request.messages.map(toLcMessage), { signal });
    for await (const chunk of stream) {
      const text = extractText(chunk.content);
      if (text) {
        yield frame({ choices: [{ index: 0, delta: { role: 'assistant', content: text }, finish_reason: null }] });
      }
    }
  }

  yield frame({ choices: [{ index: 0, delta: {}, finish_reason: step.finishReason ?? 'stop' }] });
  yield 'data: [DONE]\n\n';
}

function toByteStream(frames: AsyncGenerator<string>, chunkSize?: number, signal?: AbortSignal): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      if (signal) {
        const abortSignal = signal;
        abortSignal.addEventListener('abort', () => controller.error(abortSignal.reason), { once: true });
      }
    },
    async pull(controller) {
      const next = await frames.next();
      if (signal?.aborted) {
        return;
      }
      if (next.done) {
        controller.close();
        return;
      }
      for (const bytes of sliceBytes(encoder.encode(next.value), chunkSize)) {
        controller.enqueue(bytes);
      }
    },
    async cancel() {
      await frames.return(undefined);
    },
  });
}

async function failStep(step: FakeScenarioStep, signal?: AbortSignal): Promise<never> {
  switch (step.error) {
    case 'timeout':
      await wait(HANG_MS, signal);
      throw makeTransportError(new Error('fake connection closed'));
    case 'rate_limit':
      throw mapHttpStatusToError(429, JSON.stringify({ error: { message: 'Rate limit exceeded: free-models-per-min', code: 429 } }));
    case 'http':
      throw mapHttpStatusToError(502, '<html>Bad Gateway</html>');
    default:
      throw makeTransportError(new Error('fake network error'));
  }
}

/**
 * In-process transport that replays a scenario as OpenRouter-style SSE bytes.
 * Each `open` call takes the next step.
 */
export function createFakeListTransport(scenario: FakeScenario): ChatTransport & { readonly calls: ChatRequest[] } {
  const calls: ChatRequest[] = [];

  return {
    calls,
    async open(request, signal) {
      const step = scenario.steps[Math.min(calls.length, scenario.steps.length - 1)];
      calls.push(request);
      if (!step) {
        throw new Error(`Fake scenario has no steps: ${scenario.name}`);
      }

      await wait(step.delayMs ?? 0, signal);
      if (step.error) {
        return failStep(step, signal);
      }
      return toByteStream(renderFrames(step, request, signal), step.chunkSize, signal);
    },
  };
}
