import { makeCodepaneError, type ModelInfo } from '@codepane/shared-types';
import { z } from 'zod';
import { DEFAULT_OPENROUTER_BASE_URL } from './client';
import { makeTransportError, mapHttpStatusToError } from './errors';

export const DEFAULT_PROVIDER_ALLOW_LIST = [
  'deepseek',
  'openrouter',
  'google',
  'mistral',
  'meta',
  'moonshotai',
  'anthropic',
] as const;

export const DEFAULT_MIN_CONTEXT_LENGTH = 64_000;

const MODEL_LIST_TIMEOUT_MS = 6_000;

const modelListSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      context_length: z.number().nullish(),
      pricing: z
        .object({
          prompt: z.union([z.string(), z.number()]).nullish(),
          completion: z.union([z.string(), z.number()]).nullish(),
        })
        .nullish(),
    }),
  ),
});

export type ModelListing = z.infer<typeof modelListSchema>;

export interface ModelFilter {
  freeOnly: boolean;
  allowList?: readonly string[];
  minContextLength?: number;
}

export interface ListModelsOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
  timeoutMs?: number;
}

function isZeroPrice(value: string | number | null | undefined): boolean {
  return value !== null && value !== undefined && Number(value) === 0;
}

export function filterModels(listing: ModelListing, filter: ModelFilter): ModelInfo[] {
  const allowList = filter.allowList ?? DEFAULT_PROVIDER_ALLOW_LIST;
  const minContext = filter.minContextLength ?? DEFAULT_MIN_CONTEXT_LENGTH;
  const result: ModelInfo[] = [];

  for (const model of listing.data) {
    if (!allowList.some((provider) => model.id.includes(provider))) continue;

    const context = model.context_length;
    if (typeof context !== 'number' || !Number.isInteger(context) || context < minContext) continue;

    const free = isZeroPrice(model.pricing?.prompt) && isZeroPrice(model.pricing?.completion);
    if (filter.freeOnly && !free) continue;

    result.push({ id: model.id, contextLength: context, free });
  }

  return result;
}

export function formatModelLabel(model: ModelInfo): string {
  return `${model.id} | ${Math.floor(model.contextLength / 1024)}K ${model.free ? 'free' : 'paid'}`;
}

/** Accepts a bare id or a label produced by `formatModelLabel`. */
export function parseModelLabel(label: string): string {
  return label.split('|')[0]?.trim() ?? '';
}

export async function listModels(filter: ModelFilter, options: ListModelsOptions = {}): Promise<ModelInfo[]> {
  const fetchImpl = options.fetch ?? fetch;
  let response: Response;
  try {
    response = await fetchImpl(`${options.baseUrl ?? DEFAULT_OPENROUTER_BASE_URL}/models`, {
      signal: AbortSignal.timeout(options.timeoutMs ?? MODEL_LIST_TIMEOUT_MS),
    });
  } catch (error) {
    throw makeTransportError(error);
  }

  if (!response.ok) {
    throw mapHttpStatusToError(response.status, await response.text());
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch {
    throw makeCodepaneError('Failed to parse model listing JSON', 'decode', false);
  }

  const parsed = modelListSchema.safeParse(payload);
  if (!parsed.success) {
    throw makeCodepaneError('Unexpected model listing shape', 'decode', false);
  }
  return filterModels(parsed.data, filter);
}
