import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

const TEMPLATE_FILENAMES = ['system.base.md', 'system.style.md'] as const;

export interface PromptVars {
  RESPONSE_LANGUAGE: string;
}

export interface BuildPromptOptions {
  vars: PromptVars;
  templatesDir?: string;
}

export interface PromptBuildResult {
  prompt: string;
  unresolvedPlaceholders: string[];
}

const PLACEHOLDER = /{{\s*([A-Z0-9_]+)\s*}}/g;

function isPromptVar(key: string, vars: PromptVars): key is keyof PromptVars {
  return Object.prototype.hasOwnProperty.call(vars, key);
}

/** Fills known variables in one pass; unknown placeholders stay in the text and are reported. */
function fillPlaceholders(template: string, vars: PromptVars): PromptBuildResult {
  const unresolved = new Set<string>();
  const prompt = template.replace(PLACEHOLDER, (placeholder, key: string) => {
    if (isPromptVar(key, vars)) {
      return vars[key];
    }
    unresolved.add(key);
    return placeholder;
  });
  return { prompt: prompt.trim(), unresolvedPlaceholders: [...unresolved] };
}

async function readTemplate(filename: string, templatesDir: string): Promise<string> {
  return (await readFile(join(templatesDir, filename), 'utf8')).trim();
}

/** Joins the system templates in order, separated by a blank line, and fills their variables. */
export async function buildSystemPrompt(options: BuildPromptOptions): Promise<PromptBuildResult> {
  const templatesDir = options.templatesDir ?? fileURLToPath(new URL('./templates', import.meta.url));
  const sections = await Promise.all(TEMPLATE_FILENAMES.map((filename) => readTemplate(filename, templatesDir)));
  return fillPlaceholders(sections.filter(Boolean).join('\n\n'), options.vars);
}
