import type { CodeBlock } from '@codepane/shared-types';
import { normalizeLanguage } from './languages';

// Opening fence with an optional tag; anything after the tag on that line
// (an info string such as `title="a.py"`) is skipped. Then the body, then the
// first fence that starts a line after it. An opening fence with no closing
// fence never matches.
const FENCE_PATTERN = /```[ \t]*([^\s`]*)[^\n]*\r?\n([\s\S]*?)\r?\n```/g;

export function scanCodeBlocks(text: string): CodeBlock[] {
  const blocks: CodeBlock[] = [];
  for (const match of text.matchAll(FENCE_PATTERN)) {
    const code = match[2] ?? '';
    if (!code.trim()) {
      continue;
    }
    const start = match.index ?? 0;
    blocks.push({
      language: normalizeLanguage(match[1] ?? ''),
      code,
      sourceSpan: [start, start + match[0].length],
    });
  }
  return blocks;
}

function blockKey(block: Pick<CodeBlock, 'language' | 'code'>): string {
  return `${block.language}\u0000${block.code}`;
}

/** Blocks of `found` whose language and code are not already in `known`, in order. */
export function dedupeCodeBlocks(known: readonly CodeBlock[], found: readonly CodeBlock[]): CodeBlock[] {
  const seen = new Set(known.map(blockKey));
  const fresh: CodeBlock[] = [];
  for (const block of found) {
    const key = blockKey(block);
    if (seen.has(key)) continue;
    seen.add(key);
    fresh.push(block);
  }
  return fresh;
}
