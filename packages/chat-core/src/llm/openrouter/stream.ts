import type { FinishReason, StreamEvent } from '@codepane/shared-types';
import { z } from 'zod';

const DATA_MARKER = 'data:';
const DONE_MARKER = '[DONE]';

const streamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.unknown() }).nullish(),
        finish_reason: z.string().nullish(),
      }),
    )
    .optional(),
  error: z
    .object({
      message: z.string().optional(),
      code: z.union([z.number(), z.string()]).optional(),
    })
    .optional(),
});

function toFinishReason(value: string): FinishReason {
  if (value === 'length') return 'length';
  if (value === 'stop') return 'stop';
  return 'other';
}

function decodePayload(payload: string): unknown {
  try {
    return JSON.parse(payload) as unknown;
  } catch (error) {
    console.debug('[codepane][stream] dropping undecodable payload', {
      reason: (error as Error).message,
      preview: payload.slice(0, 80),
    });
    return undefined;
  }
}

/**
 * Decodes one line of an OpenRouter event stream. Keep-alives, comments and
 * malformed payloads yield no events and never throw.
 */
export function parseStreamLine(line: string): StreamEvent[] {
  const trimmed = line.trim();
  const payload = trimmed.startsWith(DATA_MARKER) ? trimmed.slice(DATA_MARKER.length).trim() : trimmed;
  if (!payload) {
    return [];
  }
  if (payload === DONE_MARKER) {
    return [{ type: 'done' }];
  }
  if (!payload.startsWith('{')) {
    return [];
  }

  const json = decodePayload(payload);
  if (json === undefined) {
    return [];
  }

  const parsed = streamChunkSchema.safeParse(json);
  if (!parsed.success) {
    return [{ type: 'ignored' }];
  }

  const { error, choices } = parsed.data;
  if (error) {
    const status = typeof error.code === 'number' ? error.code : undefined;
    return [{ type: 'error', message: error.message ?? 'Upstream stream error', status }];
  }

  const choice = choices?.[0];
  const events: StreamEvent[] = [];
  const content = choice?.delta?.content;
  if (typeof content === 'string' && content) {
    events.push({ type: 'content', text: content });
  }
  if (choice?.finish_reason) {
    events.push({ type: 'finish', reason: toFinishReason(choice.finish_reason) });
  }
  return events.length > 0 ? events : [{ type: 'ignored' }];
}

/**
 * Splits a byte stream into text lines. Lines and multi-byte characters cut by
 * a chunk boundary are carried into the next chunk.
 */
export async function* splitLines(stream: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let finished = false;

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        finished = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split(/\r?\n/);
      buffer = lines.pop() ?? '';
      for (const line of lines) {
        yield line;
      }
    }

    buffer += decoder.decode();
    if (buffer) {
      yield buffer;
    }
  } finally {
    if (!finished) {
      await reader.cancel().catch((error: unknown) => {
        console.debug('[codepane][stream] reader cancel failed', { reason: (error as Error).message });
      });
    }
    reader.releaseLock();
  }
}

export async function* parseOpenRouterSse(stream: ReadableStream<Uint8Array>): AsyncGenerator<StreamEvent> {
  for await (const line of splitLines(stream)) {
    for (const event of parseStreamLine(line)) {
      yield event;
      if (event.type === 'done') {
        return;
      }
    }
  }
}
