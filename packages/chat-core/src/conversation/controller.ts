import {
  makeCodepaneError,
  type ChatMessage,
  type CodeBlock,
  type ConversationEvent,
  type TerminalSessionState,
} from '@codepane/shared-types';
import { dedupeCodeBlocks, scanCodeBlocks } from '../code-fence/scanner';
import type { ChatRequest } from '../llm/contracts';
import {
  DEFAULT_CONTINUATION_PROMPT,
  type ConversationController,
  type ConversationControllerConfig,
  type TurnResult,
} from './types';

export const DEFAULT_HISTORY_WINDOW = 15;

function lastAssistantIndex(messages: ChatMessage[]): number {
  for (let i = messages.length - 1; i >= 0; i -= 1) {
    if (messages[i]?.role === 'assistant') {
      return i;
    }
  }
  return -1;
}

export function composeOutboundMessages(
  systemPrompt: string,
  history: ChatMessage[],
  next: ChatMessage,
  historyWindow: number,
): ChatMessage[] {
  const window = historyWindow > 0 ? history.slice(-historyWindow) : [];
  return [
    ...(systemPrompt.trim() ? [{ role: 'system' as const, content: systemPrompt }] : []),
    ...window,
    next,
  ];
}

export function createConversationController(config: ConversationControllerConfig): ConversationController {
  const listeners = new Set<(event: ConversationEvent) => void>();
  const now = config.now ?? Date.now;
  const historyWindow = config.historyWindow ?? DEFAULT_HISTORY_WINDOW;
  const continuationMode = config.continuationMode ?? 'append';
  const continuationPrompt = config.continuationPrompt ?? DEFAULT_CONTINUATION_PROMPT;

  let messages: ChatMessage[] = [];
  let surfaced: CodeBlock[] = [];
  let historyFile: string | null = null;
  let lastState: TerminalSessionState | null = null;
  let turnInFlight = false;
  let persisting: Promise<void> = Promise.resolve();

  const emit = (event: ConversationEvent): void => {
    for (const listener of listeners) {
      listener(event);
    }
  };

  config.session.subscribe(emit);

  const emitHistory = (): void => {
    emit({ type: 'history.changed', payload: { messages: [...messages] } });
  };

  const surface = (text: string): CodeBlock[] => {
    const fresh = dedupeCodeBlocks(surfaced, scanCodeBlocks(text));
    if (fresh.length > 0) {
      surfaced = [...surfaced, ...fresh];
      emit({ type: 'code.blocks.added', payload: { blocks: fresh } });
    }
    return fresh;
  };

  const persist = (): void => {
    const store = config.historyStore;
    if (!store) {
      return;
    }
    const snapshot = [...messages];
    const target = historyFile ?? undefined;
    persisting = persisting.then(async () => {
      try {
        const filename = await store.save(snapshot, target);
        historyFile = historyFile ?? filename;
        emit({ type: 'history.persisted', payload: { filename } });
      } catch (error) {
        const reason = (error as Error).message;
        console.warn('[codepane][history] autosave failed', { reason });
        emit({ type: 'history.persist.failed', payload: { reason } });
      }
    });
  };

  const assertIdle = (): void => {
    if (turnInFlight || config.session.isBusy()) {
      throw makeCodepaneError('A response is already streaming; wait for it or cancel it first', 'session_busy', false);
    }
  };

  async function runTurn(next: ChatMessage, continuation: boolean): Promise<TurnResult> {
    assertIdle();
    turnInFlight = true;

    try {
      const apiKey = (await config.resolveApiKey())?.trim();
      if (!apiKey) {
        throw makeCodepaneError('No API key selected', 'credential', false);
      }

      const continuedIndex = continuation ? lastAssistantIndex(messages) : -1;
      const continuedText = continuedIndex >= 0 ? (messages[continuedIndex]?.content ?? '') : '';
      const parameters = config.getParameters();
      const request: ChatRequest = {
        apiKey,
        model: parameters.model,
        temperature: parameters.temperature,
        maxTokens: parameters.maxTokens,
        providerFlags: parameters.providerFlags,
        messages: composeOutboundMessages(config.systemPrompt, messages, next, historyWindow),
      };

      messages = [...messages, next];
      emitHistory();

      const startedAt = now();
      emit({ type: 'turn.started', payload: { continuation, model: parameters.model } });
      const outcome = await config.session.start(request);
      const answered = outcome.state === 'completed' || outcome.state === 'truncated';
      if (continuation && !answered) {
        // The previous answer is still cut off: drop the instruction and keep it resumable.
        messages = messages.slice(0, -1);
        emitHistory();
      } else {
        lastState = outcome.state;
      }

      let newBlocks: CodeBlock[] = [];
      if (answered) {
        if (continuation && continuationMode === 'merge' && continuedIndex >= 0) {
          messages = messages
            .slice(0, -1)
            .map((message, index) =>
              index === continuedIndex ? { role: message.role, content: message.content + outcome.text } : message,
            );
        } else {
          messages = [...messages, { role: 'assistant', content: outcome.text }];
        }
        emitHistory();
        newBlocks = surface(continuedText + outcome.text);
        persist();
      }

      const endedAt = now();
      emit({
        type: 'turn.completed',
        payload: {
          requestId: outcome.requestId,
          state: outcome.state,
          content: outcome.text,
          continuation,
          timing: { startedAt, endedAt, durationMs: endedAt - startedAt },
        },
      });

      return { ...outcome, continuation, newBlocks };
    } finally {
      turnInFlight = false;
    }
  }

  return {
    async send(text) {
      if (!text.trim()) {
        throw makeCodepaneError('Type a question first', 'invalid_state', false);
      }
      return runTurn({ role: 'user', content: text }, false);
    },

    async continue() {
      if (lastState !== 'truncated' || lastAssistantIndex(messages) < 0) {
        throw makeCodepaneError('There is no truncated answer to continue', 'invalid_state', false);
      }
      return runTurn({ role: 'user', content: continuationPrompt }, true);
    },

    cancel() {
      config.session.cancel();
    },

    clear() {
      assertIdle();
      messages = [];
      surfaced = [];
      historyFile = null;
      lastState = null;
      emit({ type: 'conversation.cleared' });
      emitHistory();
    },

    load(loaded, filename) {
      assertIdle();
      messages = loaded.map((message) => ({ role: message.role, content: message.content }));
      surfaced = [];
      historyFile = filename ?? null;
      lastState = null;
      emitHistory();
      for (const message of messages) {
        if (message.role === 'assistant') {
          surface(message.content);
        }
      }
    },

    async saveAs(filename) {
      const store = config.historyStore;
      if (!store) {
        throw makeCodepaneError('No history store configured', 'persistence', false);
      }
      await persisting;
      const saved = await store.save([...messages], filename);
      historyFile = saved;
      emit({ type: 'history.persisted', payload: { filename: saved } });
      return saved;
    },

    canContinue() {
      return lastState === 'truncated' && !turnInFlight;
    },

    isBusy() {
      return turnInFlight || config.session.isBusy();
    },

    getMessages() {
      return [...messages];
    },

    getCodeBlocks() {
      return [...surfaced];
    },

    getHistoryFile() {
      return historyFile;
    },

    whenPersisted() {
      return persisting;
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
