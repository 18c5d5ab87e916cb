import aliasTable from './language-aliases.json';

export const PLAIN_TEXT_LANGUAGE = 'text';

const ALIASES: ReadonlyMap<string, string> = new Map(Object.entries(aliasTable));

const HIGHLIGHTABLE = new Set([...ALIASES.values()].filter((language) => language !== PLAIN_TEXT_LANGUAGE));

/**
 * Maps a fence tag to its display language. Unknown tags are returned as
 * written; an empty tag becomes plain text.
 */
export function normalizeLanguage(tag: string): string {
  const trimmed = tag.trim();
  if (!trimmed) {
    return PLAIN_TEXT_LANGUAGE;
  }
  return ALIASES.get(trimmed.toLowerCase()) ?? trimmed;
}

export function isHighlightable(language: string): boolean {
  return HIGHLIGHTABLE.has(language);
}
