import { isHighlightable } from '@codepane/chat-core';
import type { ChatMessage, CodeBlock, CodepaneError, TurnTiming } from '@codepane/shared-types';

export const ATTACHMENT_PREVIEW_CHARS = 2000;

export const HELP_TEXT = [
  'Type a message to ask the model. Commands:',
  '  /continue              resume a truncated answer',
  '  /stop                  stop the answer being streamed',
  '  /clear                 start a new conversation',
  '  /save [name]           save the conversation',
  '  /load <file>           load a saved conversation',
  '  /history [clear]       list saved conversations, or delete them all',
  '  /models                list available models',
  '  /model <id>            choose the model',
  '  /keys                  list stored API keys',
  '  /key add <label> <secret> | /key use <label> | /key remove <label>',
  '  /temp <0-2>            set the temperature',
  '  /tokens <n>            set the response token limit',
  '  /attach <path>         attach a text file to the next message',
  '  /blocks                show the code blocks found so far',
  '  /quit                  exit',
].join('\n');

export function formatError(error: Pick<CodepaneError, 'message' | 'status'>): string {
  return `Error (${error.status}): ${error.message}`;
}

export function formatDuration(timing: TurnTiming): string {
  return `${((timing.durationMs ?? 0) / 1000).toFixed(1)}s`;
}

function lineCount(code: string): number {
  return code.split('\n').length;
}

export function formatBlockSummary(blocks: readonly CodeBlock[]): string {
  const languages = [...new Set(blocks.map((block) => block.language))].join(', ');
  const noun = blocks.length === 1 ? 'code block' : 'code blocks';
  return `[${blocks.length} new ${noun}: ${languages}; /blocks to view]`;
}

export function formatBlocks(blocks: readonly CodeBlock[]): string {
  if (blocks.length === 0) {
    return 'No code blocks yet.';
  }
  return blocks
    .map((block, index) => {
      const lines = lineCount(block.code);
      const count = `${lines} ${lines === 1 ? 'line' : 'lines'}`;
      const note = isHighlightable(block.language) ? count : `${count}, not highlighted`;
      const header = `#${index + 1} ${block.language} (${note})`;
      return `${header}\n${block.code}`;
    })
    .join('\n\n');
}

export function formatTranscript(messages: readonly ChatMessage[]): string {
  return messages
    .filter((message) => message.role !== 'system')
    .map((message) => `${message.role === 'user' ? 'You' : 'Assistant'}: ${message.content}`)
    .join('\n\n');
}

export function formatList(title: string, items: readonly string[], empty: string): string {
  if (items.length === 0) {
    return empty;
  }
  return [title, ...items.map((item) => `  ${item}`)].join('\n');
}

/** Folds a file into the outgoing message; long files are cut to a preview. */
export function formatAttachment(filename: string, content: string): string {
  const preview =
    content.length > ATTACHMENT_PREVIEW_CHARS ? `${content.slice(0, ATTACHMENT_PREVIEW_CHARS)}...` : content;
  return `[Attached file: ${filename}]\n${preview}`;
}
