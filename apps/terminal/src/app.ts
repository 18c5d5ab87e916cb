import { readFile } from 'node:fs/promises';
import path from 'node:path';
import {
  formatModelLabel,
  parseModelLabel,
  type ConversationController,
  type TurnResult,
} from '@codepane/chat-core';
import {
  TOKEN_OPTIONS,
  toCodepaneError,
  type AppSettings,
  type CodeBlock,
  type ConversationEvent,
  type ModelInfo,
} from '@codepane/shared-types';
import {
  autosaveFilename,
  normalizeHistoryFilename,
  type CredentialStore,
  type HistoryStore,
} from '@codepane/storage-local';
import { parseCommand, type Command } from './commands';
import {
  HELP_TEXT,
  formatAttachment,
  formatBlockSummary,
  formatBlocks,
  formatDuration,
  formatError,
  formatList,
  formatTranscript,
} from './renderer';

export interface TerminalOutput {
  write(text: string): void;
}

export interface SettingsAccess {
  get(): AppSettings;
  update(patch: Partial<AppSettings>): AppSettings;
}

export interface TerminalAppDeps {
  controller: ConversationController;
  historyStore: HistoryStore;
  credentials: CredentialStore;
  settings: SettingsAccess;
  listModels: (freeOnly: boolean) => Promise<ModelInfo[]>;
  output: TerminalOutput;
  readTextFile?: (filePath: string) => Promise<string>;
  now?: () => Date;
}

export type LineResult = 'continue' | 'quit';

export interface TerminalApp {
  handleLine(line: string): Promise<LineResult>;
  /** Settles once the turn started last has finished. */
  idle(): Promise<void>;
  dispose(): void;
}

/** The secret of the key selected in settings, or `fallback` when none is usable. */
export function resolveSelectedKey(
  credentials: CredentialStore,
  settings: AppSettings,
  fallback: string | null = null,
): string | null {
  const label = settings.lastCredential;
  const credential = label ? credentials.resolve(label) : null;
  return credential?.secret ?? fallback;
}

export function createTerminalApp(deps: TerminalAppDeps): TerminalApp {
  const { controller, output } = deps;
  const now = deps.now ?? (() => new Date());
  const readTextFile = deps.readTextFile ?? ((filePath: string) => readFile(filePath, 'utf8'));

  let turn: Promise<void> = Promise.resolve();
  let attachment: string | null = null;
  let turnBlocks: CodeBlock[] = [];

  const print = (text: string): void => {
    output.write(`${text}\n`);
  };

  const onEvent = (event: ConversationEvent): void => {
    switch (event.type) {
      case 'turn.started':
        turnBlocks = [];
        output.write(event.payload.continuation ? '\n(continuing)\n' : '\n');
        break;
      case 'session.display.update':
        output.write(event.payload.text);
        break;
      case 'session.failed':
        print(`\n${formatError(event.payload)}`);
        break;
      case 'code.blocks.added':
        turnBlocks = [...turnBlocks, ...event.payload.blocks];
        break;
      case 'history.persist.failed':
        print(`[autosave failed: ${event.payload.reason}]`);
        break;
      case 'turn.completed': {
        const { state, timing } = event.payload;
        if (state === 'completed') {
          print(`\n[done in ${formatDuration(timing)}]`);
        } else if (state === 'truncated') {
          print('\n[answer cut off at the token limit; /continue to resume]');
        } else if (state === 'cancelled') {
          print('\n[stopped]');
        }
        if (turnBlocks.length > 0) {
          print(formatBlockSummary(turnBlocks));
          turnBlocks = [];
        }
        break;
      }
      default:
        break;
    }
  };

  const unsubscribe = controller.subscribe(onEvent);

  const startTurn = (run: () => Promise<TurnResult>): void => {
    if (controller.isBusy()) {
      print('A response is still streaming; /stop it first.');
      return;
    }
    turn = run().then(
      () => undefined,
      (error: unknown) => {
        print(formatError(toCodepaneError(error, 'invalid_state')));
      },
    );
  };

  const sendMessage = (text: string): void => {
    const body = attachment ? [text.trim(), attachment].filter(Boolean).join('\n\n') : text;
    if (body.trim()) {
      attachment = null;
    }
    startTurn(() => controller.send(body));
  };

  async function dispatch(command: Command): Promise<LineResult> {
    const settings = deps.settings;

    switch (command.kind) {
      case 'message':
        sendMessage(command.text);
        break;
      case 'continue':
        if (!controller.canContinue()) {
          print('Nothing to continue; the last answer was not cut off.');
          break;
        }
        startTurn(() => controller.continue());
        break;
      case 'stop':
        if (controller.isBusy()) {
          controller.cancel();
        } else {
          print('Nothing to stop.');
        }
        break;
      case 'clear':
        controller.clear();
        attachment = null;
        print('Conversation cleared.');
        break;
      case 'save': {
        const saved = await controller.saveAs(command.name ?? autosaveFilename(now()));
        print(`Saved to ${saved}`);
        break;
      }
      case 'load': {
        const filename = normalizeHistoryFilename(command.file);
        const messages = await deps.historyStore.load(filename);
        controller.load(messages, filename);
        if (messages.length > 0) {
          print(formatTranscript(messages));
        }
        print(`Loaded ${messages.length} messages from ${filename}`);
        const blocks = controller.getCodeBlocks();
        if (blocks.length > 0) {
          print(formatBlockSummary(blocks));
        }
        break;
      }
      case 'history': {
        const files = await deps.historyStore.list();
        print(formatList('Saved conversations (newest first):', files, 'No saved conversations.'));
        break;
      }
      case 'history-clear': {
        const count = await deps.historyStore.clearAll();
        print(`Deleted ${count} saved ${count === 1 ? 'conversation' : 'conversations'}.`);
        break;
      }
      case 'models': {
        const models = await deps.listModels(settings.get().freeOnly);
        print(formatList('Models:', models.map(formatModelLabel), 'No models matched the filter.'));
        break;
      }
      case 'model': {
        const updated = settings.update({ model: parseModelLabel(command.id) });
        print(`Model set to ${updated.model}`);
        break;
      }
      case 'keys': {
        const current = settings.get().lastCredential;
        const labels = deps.credentials.list().map((label) => (label === current ? `${label} (in use)` : label));
        print(formatList('API keys:', labels, 'No API keys stored; add one with /key add <label> <secret>.'));
        break;
      }
      case 'key-add': {
        deps.credentials.add(command.label, command.secret);
        const label = command.label.trim();
        if (!settings.get().lastCredential) {
          settings.update({ lastCredential: label });
        }
        print(`Stored key ${label}`);
        break;
      }
      case 'key-use':
        if (!deps.credentials.resolve(command.label)) {
          print(`No usable key named ${command.label}`);
          break;
        }
        settings.update({ lastCredential: command.label });
        print(`Using key ${command.label}`);
        break;
      case 'key-remove': {
        const removed = deps.credentials.remove(command.label);
        if (removed && settings.get().lastCredential === command.label) {
          settings.update({ lastCredential: '' });
        }
        print(removed ? `Removed key ${command.label}` : `No key named ${command.label}`);
        break;
      }
      case 'temp': {
        const updated = settings.update({ temperature: command.value });
        print(`Temperature set to ${updated.temperature}`);
        break;
      }
      case 'tokens': {
        const maxTokens = TOKEN_OPTIONS.find((option) => option === command.value);
        if (maxTokens === undefined) {
          print(`Token limit must be one of ${TOKEN_OPTIONS.join(', ')}`);
          break;
        }
        settings.update({ maxTokens });
        print(`Token limit set to ${maxTokens}`);
        break;
      }
      case 'attach': {
        const content = await readTextFile(command.path);
        const filename = path.basename(command.path);
        attachment = formatAttachment(filename, content);
        print(`Attached ${filename} (${content.length} characters); it goes out with your next message.`);
        break;
      }
      case 'blocks':
        print(formatBlocks(controller.getCodeBlocks()));
        break;
      case 'help':
        print(HELP_TEXT);
        break;
      case 'quit':
        if (controller.isBusy()) {
          controller.cancel();
        }
        return 'quit';
      case 'invalid':
        print(command.reason);
        break;
    }
    return 'continue';
  }

  return {
    async handleLine(line) {
      try {
        return await dispatch(parseCommand(line));
      } catch (error) {
        print(formatError(toCodepaneError(error, 'invalid_state')));
        return 'continue';
      }
    },

    idle() {
      return turn;
    },

    dispose() {
      unsubscribe();
    },
  };
}
