import type { ChatMessage, ConversationEvent } from '@codepane/shared-types';
import { describe, expect, it, vi } from 'vitest';
import { composeOutboundMessages, createConversationController } from '../src/conversation/controller';
import type { ConversationControllerConfig } from '../src/conversation/types';
import { DEFAULT_CONTINUATION_PROMPT } from '../src/conversation/types';
import { mapHttpStatusToError } from '../src/llm/openrouter/errors';
import { createStreamingSession } from '../src/session/streaming-session';
import {
  contentFrame,
  createControlledStream,
  createScriptedTransport,
  sseBody,
  type ScriptedResponse,
} from './helpers';

const SYSTEM_PROMPT = 'You are a coding assistant.';

function setup(responses: ScriptedResponse[], overrides: Partial<ConversationControllerConfig> = {}) {
  const transport = createScriptedTransport(responses);
  const save = vi.fn(async (_messages: ChatMessage[], filename?: string) => filename ?? 'autosave_20260102-030405.json');
  const controller = createConversationController({
    session: createStreamingSession({ transport }),
    systemPrompt: SYSTEM_PROMPT,
    resolveApiKey: () => 'test-secret',
    getParameters: () => ({ model: 'deepseek/deepseek-chat:free', temperature: 0.4, maxTokens: 4096 }),
    historyStore: { save },
    ...overrides,
  });
  const events: ConversationEvent[] = [];
  controller.subscribe((event) => events.push(event));
  return { controller, transport, save, events };
}

describe('composeOutboundMessages', () => {
  it('sends the system prompt, the trailing window and the new message', () => {
    const history: ChatMessage[] = [
      { role: 'user', content: 'q1' },
      { role: 'assistant', content: 'a1' },
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: 'a2' },
    ];
    expect(composeOutboundMessages('sys', history, { role: 'user', content: 'q3' }, 2)).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: 'a2' },
      { role: 'user', content: 'q3' },
    ]);
    expect(composeOutboundMessages('', history, { role: 'user', content: 'q3' }, 0)).toEqual([
      { role: 'user', content: 'q3' },
    ]);
  });
});

describe('conversation controller', () => {
  it('records the exchange, surfaces code blocks and autosaves', async () => {
    const { controller, transport, save, events } = setup([
      sseBody(['Try this:\n```py\nprint("hi")\n```']),
      sseBody(['Again:\n```python\nprint("hi")\n```\n```js\nconsole.log(1)\n```']),
    ]);

    const first = await controller.send('How do I print?');
    await controller.whenPersisted();

    expect(first.state).toBe('completed');
    expect(transport.calls[0]?.messages).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'How do I print?' },
    ]);
    expect(transport.calls[0]?.apiKey).toBe('test-secret');
    expect(controller.getMessages()).toEqual([
      { role: 'user', content: 'How do I print?' },
      { role: 'assistant', content: 'Try this:\n```py\nprint("hi")\n```' },
    ]);
    expect(first.newBlocks).toEqual([{ language: 'python', code: 'print("hi")', sourceSpan: [10, 31] }]);
    expect(events).toContainEqual({ type: 'history.persisted', payload: { filename: 'autosave_20260102-030405.json' } });
    expect(controller.getHistoryFile()).toBe('autosave_20260102-030405.json');
    expect(save).toHaveBeenCalledWith(controller.getMessages(), undefined);

    const second = await controller.send('And in JavaScript?');
    await controller.whenPersisted();

    expect(second.newBlocks.map((block) => block.language)).toEqual(['javascript']);
    expect(controller.getCodeBlocks().map((block) => block.code)).toEqual(['print("hi")', 'console.log(1)']);
    expect(save).toHaveBeenLastCalledWith(controller.getMessages(), 'autosave_20260102-030405.json');
  });

  it('rejects empty input', async () => {
    const { controller, transport } = setup([]);
    await expect(controller.send('   ')).rejects.toMatchObject({ code: 'invalid_state' });
    expect(transport.calls).toHaveLength(0);
  });

  it('refuses to send without an API key', async () => {
    const { controller, transport } = setup([], { resolveApiKey: () => null });
    await expect(controller.send('hello')).rejects.toMatchObject({ code: 'credential' });
    expect(transport.calls).toHaveLength(0);
    expect(controller.getMessages()).toEqual([]);
    expect(controller.isBusy()).toBe(false);
  });

  it('sends only the configured history window', async () => {
    const { controller, transport } = setup([sseBody(['a1']), sseBody(['a2']), sseBody(['a3'])], { historyWindow: 2 });

    await controller.send('q1');
    await controller.send('q2');
    await controller.send('q3');

    expect(transport.calls[2]?.messages).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: 'a2' },
      { role: 'user', content: 'q3' },
    ]);
  });

  it('only continues a truncated answer', async () => {
    const { controller } = setup([sseBody(['done'])]);
    await expect(controller.continue()).rejects.toMatchObject({ code: 'invalid_state' });
    await controller.send('q');
    expect(controller.canContinue()).toBe(false);
    await expect(controller.continue()).rejects.toMatchObject({ code: 'invalid_state' });
  });

  it('appends a continuation and finds the fence split across both parts', async () => {
    const { controller, transport, events } = setup([
      sseBody(['```ts\nconst a = 1;\n'], 'length'),
      sseBody(['const b = 2;\n```']),
    ]);

    const first = await controller.send('Write two constants');
    expect(first.state).toBe('truncated');
    expect(first.newBlocks).toEqual([]);
    expect(controller.canContinue()).toBe(true);

    const resumed = await controller.continue();

    expect(resumed.continuation).toBe(true);
    expect(transport.calls[1]?.messages.at(-1)).toEqual({ role: 'user', content: DEFAULT_CONTINUATION_PROMPT });
    expect(controller.getMessages()).toEqual([
      { role: 'user', content: 'Write two constants' },
      { role: 'assistant', content: '```ts\nconst a = 1;\n' },
      { role: 'user', content: DEFAULT_CONTINUATION_PROMPT },
      { role: 'assistant', content: 'const b = 2;\n```' },
    ]);
    expect(resumed.newBlocks).toEqual([
      { language: 'javascript', code: 'const a = 1;\nconst b = 2;', sourceSpan: [0, 35] },
    ]);
    const [, answer, , continuation] = controller.getMessages();
    expect(`${answer?.content}${continuation?.content}`.slice(0, 35)).toBe('```ts\nconst a = 1;\nconst b = 2;\n```');
    expect(events.filter((event) => event.type === 'turn.started')).toEqual([
      { type: 'turn.started', payload: { continuation: false, model: 'deepseek/deepseek-chat:free' } },
      { type: 'turn.started', payload: { continuation: true, model: 'deepseek/deepseek-chat:free' } },
    ]);
    expect(controller.canContinue()).toBe(false);
  });

  it('merges a continuation into the previous answer', async () => {
    const { controller } = setup(
      [sseBody(['Part one, '], 'length'), sseBody(['part two.'])],
      { continuationMode: 'merge' },
    );

    await controller.send('Tell me');
    await controller.continue();

    expect(controller.getMessages()).toEqual([
      { role: 'user', content: 'Tell me' },
      { role: 'assistant', content: 'Part one, part two.' },
    ]);
  });

  it('keeps a truncated answer resumable after a failed continuation', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { controller } = setup(
      [
        sseBody(['Part one, '], 'length'),
        mapHttpStatusToError(429, '{"error":{"message":"rate limited"}}'),
        sseBody(['part two.']),
      ],
      { continuationMode: 'merge' },
    );

    await controller.send('Tell me');
    const failed = await controller.continue();

    expect(failed).toMatchObject({ state: 'failed', continuation: true });
    expect(failed.error?.status).toBe(429);
    expect(controller.getMessages()).toEqual([
      { role: 'user', content: 'Tell me' },
      { role: 'assistant', content: 'Part one, ' },
    ]);
    expect(controller.canContinue()).toBe(true);

    await expect(controller.continue()).resolves.toMatchObject({ state: 'completed', text: 'part two.' });
    expect(controller.getMessages()).toEqual([
      { role: 'user', content: 'Tell me' },
      { role: 'assistant', content: 'Part one, part two.' },
    ]);
    warn.mockRestore();
  });

  it('keeps the question but no answer after a failure', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { controller, save } = setup([
      mapHttpStatusToError(500, '{"error":{"message":"Internal error"}}'),
      sseBody(['fine now']),
    ]);

    const failed = await controller.send('q1');

    expect(failed.state).toBe('failed');
    expect(failed.error?.message).toBe('Internal error');
    expect(controller.getMessages()).toEqual([{ role: 'user', content: 'q1' }]);
    expect(controller.canContinue()).toBe(false);
    expect(save).not.toHaveBeenCalled();

    await expect(controller.send('q2')).resolves.toMatchObject({ state: 'completed', text: 'fine now' });
    warn.mockRestore();
  });

  it('reports autosave failures without throwing', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { controller, events } = setup([sseBody(['answer'])], {
      historyStore: { save: async () => Promise.reject(new Error('disk full')) },
    });

    await expect(controller.send('q')).resolves.toMatchObject({ state: 'completed' });
    await controller.whenPersisted();

    expect(events).toContainEqual({ type: 'history.persist.failed', payload: { reason: 'disk full' } });
    expect(warn).toHaveBeenCalledWith('[codepane][history] autosave failed', { reason: 'disk full' });
    expect(controller.getHistoryFile()).toBeNull();
    warn.mockRestore();
  });

  it('cancels the running answer and leaves it out of history', async () => {
    const transport = createScriptedTransport([
      async (_request, signal) => {
        const controlled = createControlledStream(signal);
        controlled.push(contentFrame('partial'));
        return controlled.stream;
      },
    ]);
    const session = createStreamingSession({ transport });
    const controller = createConversationController({
      session,
      systemPrompt: SYSTEM_PROMPT,
      resolveApiKey: () => 'test-secret',
      getParameters: () => ({ model: 'deepseek/deepseek-chat:free', temperature: 0.4, maxTokens: 4096 }),
    });

    const run = controller.send('long question');
    await vi.waitFor(() => expect(session.getText()).toBe('partial'));
    expect(() => controller.clear()).toThrow('A response is already streaming');

    controller.cancel();
    const outcome = await run;

    expect(outcome).toMatchObject({ state: 'cancelled', text: 'partial' });
    expect(controller.getMessages()).toEqual([{ role: 'user', content: 'long question' }]);
    expect(controller.canContinue()).toBe(false);
    expect(controller.isBusy()).toBe(false);
  });

  it('clears the conversation', async () => {
    const { controller, events } = setup([sseBody(['```sh\nls\n```'])]);
    await controller.send('list files');
    await controller.whenPersisted();

    controller.clear();

    expect(controller.getMessages()).toEqual([]);
    expect(controller.getCodeBlocks()).toEqual([]);
    expect(controller.getHistoryFile()).toBeNull();
    expect(events.at(-2)).toEqual({ type: 'conversation.cleared' });
    expect(events.at(-1)).toEqual({ type: 'history.changed', payload: { messages: [] } });
  });

  it('loads a saved conversation and recomputes its code blocks', () => {
    const { controller } = setup([]);
    controller.load(
      [
        { role: 'user', content: 'q' },
        { role: 'assistant', content: '```kt\nfun main() {}\n```' },
        { role: 'user', content: '```py\nnot from the model\n```' },
      ],
      'autosave_20260101-000000.json',
    );

    expect(controller.getHistoryFile()).toBe('autosave_20260101-000000.json');
    expect(controller.getCodeBlocks()).toEqual([{ language: 'kotlin', code: 'fun main() {}', sourceSpan: [0, 23] }]);
  });

  it('saves under an explicit name', async () => {
    const { controller, save } = setup([sseBody(['answer'])]);
    await controller.send('q');

    await expect(controller.saveAs('notes.json')).resolves.toBe('notes.json');
    expect(save).toHaveBeenLastCalledWith(controller.getMessages(), 'notes.json');
    expect(controller.getHistoryFile()).toBe('notes.json');
  });
});
