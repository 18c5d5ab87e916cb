import type { StreamEvent } from '@codepane/shared-types';
import { describe, expect, it, vi } from 'vitest';
import { parseOpenRouterSse, parseStreamLine, splitLines } from '../src/llm/openrouter/stream';
import { DONE_FRAME, contentFrame, finishFrame, streamFrom } from './helpers';

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

function chunkBytes(bytes: Uint8Array, size: number): Uint8Array[] {
  const chunks: Uint8Array[] = [];
  for (let offset = 0; offset < bytes.length; offset += size) {
    chunks.push(bytes.slice(offset, offset + size));
  }
  return chunks;
}

describe('parseStreamLine', () => {
  it('turns a content delta into a content event', () => {
    expect(parseStreamLine('data: {"choices":[{"delta":{"content":"hello"}}]}')).toEqual([
      { type: 'content', text: 'hello' },
    ]);
  });

  it('treats a line without the data marker as a payload', () => {
    expect(parseStreamLine('{"choices":[{"delta":{"content":"raw"}}]}')).toEqual([{ type: 'content', text: 'raw' }]);
  });

  it('maps finish reasons', () => {
    expect(parseStreamLine(finishFrame('stop').trim())).toEqual([{ type: 'finish', reason: 'stop' }]);
    expect(parseStreamLine(finishFrame('length').trim())).toEqual([{ type: 'finish', reason: 'length' }]);
    expect(parseStreamLine(finishFrame('content_filter').trim())).toEqual([{ type: 'finish', reason: 'other' }]);
  });

  it('emits content before the finish reason carried on the same line', () => {
    expect(parseStreamLine('data: {"choices":[{"delta":{"content":"end"},"finish_reason":"length"}]}')).toEqual([
      { type: 'content', text: 'end' },
      { type: 'finish', reason: 'length' },
    ]);
  });

  it('recognises the done marker', () => {
    expect(parseStreamLine('data: [DONE]')).toEqual([{ type: 'done' }]);
  });

  it('drops keep-alives, comments and blank lines', () => {
    expect(parseStreamLine('')).toEqual([]);
    expect(parseStreamLine('data:')).toEqual([]);
    expect(parseStreamLine(': OPENROUTER PROCESSING')).toEqual([]);
  });

  it('swallows undecodable payloads and logs them at debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    expect(parseStreamLine('data: {"choices":[{"delta"')).toEqual([]);
    expect(debug).toHaveBeenCalledTimes(1);
    debug.mockRestore();
  });

  it('ignores frames with nothing to report', () => {
    expect(parseStreamLine('data: {"choices":[{"delta":{"role":"assistant"}}]}')).toEqual([{ type: 'ignored' }]);
    expect(parseStreamLine('data: {"choices":[]}')).toEqual([{ type: 'ignored' }]);
    expect(parseStreamLine('data: {"choices":"nope"}')).toEqual([{ type: 'ignored' }]);
  });

  it('reports mid-stream provider errors', () => {
    expect(parseStreamLine('data: {"error":{"message":"Provider overloaded","code":502}}')).toEqual([
      { type: 'error', message: 'Provider overloaded', status: 502 },
    ]);
  });
});

describe('splitLines', () => {
  it('carries partial lines across chunks and flushes the unterminated tail', async () => {
    const lines = await collect(splitLines(streamFrom(['first li', 'ne\r\nsecond\n', 'tail'])));
    expect(lines).toEqual(['first line', 'second', 'tail']);
  });

  it('decodes multi-byte characters split by a chunk boundary', async () => {
    const bytes = new TextEncoder().encode('héllo ✓\n');
    const lines = await collect(splitLines(streamFrom(chunkBytes(bytes, 1))));
    expect(lines).toEqual(['héllo ✓']);
  });
});

describe('parseOpenRouterSse', () => {
  const body = [
    ': OPENROUTER PROCESSING\n\n',
    contentFrame('Grüße, '),
    contentFrame('world ✓\n'),
    contentFrame('```py\nprint(1)\n```'),
    finishFrame('stop'),
    DONE_FRAME,
  ].join('');

  it('reads content deltas up to the done marker', async () => {
    const events = await collect(parseOpenRouterSse(streamFrom([body, contentFrame('after done')])));
    const text = events.map((event) => (event.type === 'content' ? event.text : '')).join('');

    expect(text).toBe('Grüße, world ✓\n```py\nprint(1)\n```');
    expect(events.slice(-2)).toEqual([{ type: 'finish', reason: 'stop' }, { type: 'done' }]);
  });

  it('yields the same events however the bytes are chunked', async () => {
    const bytes = new TextEncoder().encode(body);
    const reference: StreamEvent[] = await collect(parseOpenRouterSse(streamFrom([bytes])));

    for (const size of [1, 2, 3, 5, 17, 64]) {
      const events = await collect(parseOpenRouterSse(streamFrom(chunkBytes(bytes, size))));
      expect(events).toEqual(reference);
    }
  });
});
