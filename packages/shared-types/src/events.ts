import type { ChatMessage, CodeBlock, SessionState, TerminalSessionState, TurnTiming } from './chat';
import type { CodepaneErrorCode } from './errors';

export type SessionEvent =
  | {
      type: 'session.state.changed';
      payload: { requestId: string; state: SessionState };
    }
  | {
      type: 'session.display.update';
      payload: { requestId: string; text: string };
    }
  | {
      type: 'session.truncated';
      payload: { requestId: string };
    }
  | {
      type: 'session.failed';
      payload: { requestId: string; code: CodepaneErrorCode; message: string; status: number };
    };

export type ConversationEvent =
  | SessionEvent
  | {
      type: 'turn.started';
      payload: { continuation: boolean; model: string };
    }
  | {
      type: 'turn.completed';
      payload: {
        requestId: string;
        state: TerminalSessionState;
        content: string;
        continuation: boolean;
        timing: TurnTiming;
      };
    }
  | {
      type: 'history.changed';
      payload: { messages: ChatMessage[] };
    }
  | {
      type: 'history.persisted';
      payload: { filename: string };
    }
  | {
      type: 'history.persist.failed';
      payload: { reason: string };
    }
  | {
      type: 'code.blocks.added';
      payload: { blocks: CodeBlock[] };
    }
  | {
      type: 'conversation.cleared';
    };
