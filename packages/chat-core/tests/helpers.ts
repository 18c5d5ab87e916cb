import type { ChatRequest, ChatTransport } from '../src/llm/contracts';

const encoder = new TextEncoder();

export function contentFrame(text: string): string {
  return `data: ${JSON.stringify({ choices: [{ index: 0, delta: { content: text }, finish_reason: null }] })}\n\n`;
}

export function finishFrame(reason: string): string {
  return `data: ${JSON.stringify({ choices: [{ index: 0, delta: {}, finish_reason: reason }] })}\n\n`;
}

export const DONE_FRAME = 'data: [DONE]\n\n';

export function streamFrom(chunks: Array<string | Uint8Array>): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(typeof chunk === 'string' ? encoder.encode(chunk) : chunk);
      }
      controller.close();
    },
  });
}

/** A complete answer: one frame per part, then the finish frame and `[DONE]`. */
export function sseBody(parts: string[], finish: 'stop' | 'length' = 'stop'): ReadableStream<Uint8Array> {
  return streamFrom([...parts.map(contentFrame), finishFrame(finish), DONE_FRAME]);
}

export interface ControlledStream {
  stream: ReadableStream<Uint8Array>;
  push(frame: string): void;
  close(): void;
  fail(error: Error): void;
}

/** A body fed by the test. It errors when `signal` aborts, like a fetch body does. */
export function createControlledStream(signal?: AbortSignal): ControlledStream {
  let controller: ReadableStreamDefaultController<Uint8Array> | null = null;
  let open = true;

  const stream = new ReadableStream<Uint8Array>({
    start(ctrl) {
      controller = ctrl;
    },
  });

  const fail = (error: unknown) => {
    if (!open) return;
    open = false;
    controller?.error(error);
  };

  signal?.addEventListener('abort', () => fail(new DOMException('This operation was aborted', 'AbortError')), {
    once: true,
  });

  return {
    stream,
    push(frame) {
      if (open) controller?.enqueue(encoder.encode(frame));
    },
    close() {
      if (!open) return;
      open = false;
      controller?.close();
    },
    fail,
  };
}

export type ScriptedResponse =
  | ReadableStream<Uint8Array>
  | Error
  | ((request: ChatRequest, signal?: AbortSignal) => Promise<ReadableStream<Uint8Array>>);

/** Answers each `open` with the next scripted response. */
export function createScriptedTransport(responses: ScriptedResponse[]): ChatTransport & { calls: ChatRequest[] } {
  const calls: ChatRequest[] = [];
  return {
    calls,
    async open(request, signal) {
      const next = responses[calls.length];
      calls.push(request);
      if (next === undefined) {
        throw new Error(`No scripted response for call ${calls.length}`);
      }
      if (next instanceof Error) {
        throw next;
      }
      if (typeof next === 'function') {
        return next(request, signal);
      }
      return next;
    },
  };
}

export function hangUntilAborted(_request: ChatRequest, signal?: AbortSignal): Promise<ReadableStream<Uint8Array>> {
  return new Promise((_resolve, reject) => {
    if (!signal) return;
    const abortSignal = signal;
    abortSignal.addEventListener('abort', () => reject(abortSignal.reason), { once: true });
  });
}

export const baseRequest: ChatRequest = {
  apiKey: 'test-secret',
  model: 'deepseek/deepseek-chat:free',
  temperature: 0.4,
  maxTokens: 4096,
  messages: [{ role: 'user', content: 'hello' }],
};
