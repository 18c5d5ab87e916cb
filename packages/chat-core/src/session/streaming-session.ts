import {
  isCodepaneError,
  makeCodepaneError,
  toCodepaneError,
  type CodepaneError,
  type SessionEvent,
  type SessionState,
  type TerminalSessionState,
} from '@codepane/shared-types';
import type { ChatRequest, ChatTransport } from '../llm/contracts';
import { makeTimeoutError, makeTransportError } from '../llm/openrouter/errors';
import type { ReaderMessage } from '../worker/protocol';
import { runStreamReader } from '../worker/stream-reader';
import { createChannel, type Channel } from './channel';
import { createUpdateCoalescer } from './coalescer';
import { withRetry, type RetryPolicy } from './retry';

export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

const NO_RETRY: RetryPolicy = { maxAttempts: 1, backoffMs: 0 };

export interface StreamingSessionConfig {
  transport: ChatTransport;
  flushIntervalMs?: number;
  /** Covers connecting and reading the whole response. */
  requestTimeoutMs?: number;
  retry?: RetryPolicy;
  now?: () => number;
}

export interface SessionOutcome {
  requestId: string;
  state: TerminalSessionState;
  /** Everything received before the session ended, partial text included. */
  text: string;
  error?: CodepaneError;
}

export interface StreamingSession {
  start(request: ChatRequest): Promise<SessionOutcome>;
  cancel(): void;
  getState(): SessionState;
  getText(): string;
  isBusy(): boolean;
  subscribe(listener: (event: SessionEvent) => void): () => void;
}

interface AttemptTimer {
  signal: AbortSignal;
  timedOut(): boolean;
  clear(): void;
}

interface ActiveRun {
  requestId: string;
  abortController: AbortController;
  channel: Channel<ReaderMessage> | null;
  timer: AttemptTimer | null;
  running: boolean;
  cancelled: boolean;
}

function createRequestId(now: () => number): string {
  return `req-${now()}-${Math.random().toString(16).slice(2, 8)}`;
}

function createAttemptTimer(timeoutMs: number, parent: AbortSignal): AttemptTimer {
  const controller = new AbortController();
  let timedOut = false;
  const handle = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const abortOnParent = () => controller.abort(parent.reason);
  if (parent.aborted) {
    abortOnParent();
  } else {
    parent.addEventListener('abort', abortOnParent, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    clear: () => {
      clearTimeout(handle);
      parent.removeEventListener('abort', abortOnParent);
    },
  };
}

export function createStreamingSession(config: StreamingSessionConfig): StreamingSession {
  const listeners = new Set<(event: SessionEvent) => void>();
  const now = config.now ?? Date.now;
  const timeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  let state: SessionState = 'idle';
  let text = '';
  let active: ActiveRun | null = null;

  const emit = (event: SessionEvent): void => {
    for (const listener of listeners) {
      listener(event);
    }
  };

  const setState = (requestId: string, next: SessionState): void => {
    state = next;
    emit({ type: 'session.state.changed', payload: { requestId, state: next } });
  };

  const classifyReadFailure = (run: ActiveRun, error: unknown): CodepaneError => {
    if (run.timer?.timedOut()) {
      return makeTimeoutError(timeoutMs);
    }
    return isCodepaneError(error) ? error : makeTransportError(error);
  };

  async function openBody(run: ActiveRun, request: ChatRequest): Promise<ReadableStream<Uint8Array>> {
    return withRetry(
      async () => {
        const timer = createAttemptTimer(timeoutMs, run.abortController.signal);
        try {
          const body = await config.transport.open(request, timer.signal);
          run.timer = timer;
          return body;
        } catch (error) {
          timer.clear();
          if (timer.timedOut()) {
            throw makeTimeoutError(timeoutMs);
          }
          throw toCodepaneError(error, 'transport');
        }
      },
      config.retry ?? NO_RETRY,
      {
        signal: run.abortController.signal,
        onRetry: (log) => console.warn('[codepane][session] retrying request', { requestId: run.requestId, ...log }),
      },
    );
  }

  async function consume(run: ActiveRun, body: ReadableStream<Uint8Array>): Promise<{ truncated: boolean; failure?: CodepaneError }> {
    const channel = createChannel<ReaderMessage>();
    run.channel = channel;
    let truncated = false;
    let failure: CodepaneError | undefined;

    const coalescer = createUpdateCoalescer({
      intervalMs: config.flushIntervalMs,
      isActive: () => run.running,
      onFlush: (chunk) => emit({ type: 'session.display.update', payload: { requestId: run.requestId, text: chunk } }),
    });

    const reader = runStreamReader(body, channel, () => run.running);

    try {
      for await (const message of channel) {
        if (!run.running) {
          break;
        }
        if (message.type === 'error') {
          failure = classifyReadFailure(run, message.payload.error);
          break;
        }

        const event = message.payload;
        if (event.type === 'content') {
          text += event.text;
          coalescer.push(event.text);
        } else if (event.type === 'finish') {
          truncated = event.reason === 'length';
        } else if (event.type === 'error') {
          failure = makeCodepaneError(event.message, 'http_status', event.status === 429, event.status);
          break;
        } else if (event.type === 'done') {
          break;
        }
      }
    } finally {
      coalescer.drain();
    }

    if (failure) {
      run.running = false;
      run.abortController.abort();
    }
    if (!run.cancelled) {
      await reader;
    }
    return { truncated, failure };
  }

  return {
    async start(request) {
      if (active) {
        throw makeCodepaneError('A response is already streaming; wait for it or cancel it first', 'session_busy', false);
      }

      const run: ActiveRun = {
        requestId: createRequestId(now),
        abortController: new AbortController(),
        channel: null,
        timer: null,
        running: true,
        cancelled: false,
      };
      active = run;
      text = '';
      setState(run.requestId, 'idle');

      let truncated = false;
      let failure: CodepaneError | undefined;

      try {
        const body = await openBody(run, request);
        if (run.running) {
          setState(run.requestId, 'streaming');
          ({ truncated, failure } = await consume(run, body));
        } else {
          await body.cancel().catch((error: unknown) => {
            console.debug('[codepane][session] body cancel failed', { reason: (error as Error).message });
          });
        }
      } catch (error) {
        if (!run.cancelled) {
          failure = toCodepaneError(error);
        }
      } finally {
        run.timer?.clear();
        active = null;
      }

      const finalState: TerminalSessionState = run.cancelled
        ? 'cancelled'
        : failure
          ? 'failed'
          : truncated
            ? 'truncated'
            : 'completed';

      setState(run.requestId, finalState);
      if (finalState === 'failed' && failure) {
        console.warn('[codepane][session] request failed', {
          requestId: run.requestId,
          code: failure.code,
          status: failure.status,
          message: failure.message,
        });
        emit({
          type: 'session.failed',
          payload: { requestId: run.requestId, code: failure.code, message: failure.message, status: failure.status },
        });
      }
      if (finalState === 'truncated') {
        emit({ type: 'session.truncated', payload: { requestId: run.requestId } });
      }

      return {
        requestId: run.requestId,
        state: finalState,
        text,
        error: finalState === 'failed' ? failure : undefined,
      };
    },

    cancel() {
      const run = active;
      if (!run || run.cancelled) {
        return;
      }
      run.cancelled = true;
      run.running = false;
      run.abortController.abort();
      run.channel?.close();
    },

    getState() {
      return state;
    },

    getText() {
      return text;
    },

    isBusy() {
      return active !== null;
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
