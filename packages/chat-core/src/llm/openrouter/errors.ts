import { makeCodepaneError, type CodepaneError } from '@codepane/shared-types';

const MAX_RAW_BODY_CHARS = 200;

function extractProviderMessage(body: string): string | null {
  try {
    const parsed = JSON.parse(body) as { error?: { message?: unknown } } | null;
    const message = parsed?.error?.message;
    return typeof message === 'string' && message.trim() ? message : null;
  } catch {
    return null;
  }
}

function truncateBody(body: string): string {
  return body.length > MAX_RAW_BODY_CHARS ? `${body.slice(0, MAX_RAW_BODY_CHARS)}...` : body;
}

export function mapHttpStatusToError(status: number, body: string): CodepaneError {
  const message = extractProviderMessage(body) ?? (truncateBody(body.trim()) || `HTTP ${status}`);
  return makeCodepaneError(message, 'http_status', status === 429 || status >= 500, status);
}

export function makeTransportError(error: unknown): CodepaneError {
  const reason = error instanceof Error ? error.message : String(error);
  return makeCodepaneError(`Network request failed: ${reason}`, 'transport', false);
}

export function makeTimeoutError(timeoutMs: number): CodepaneError {
  return makeCodepaneError(`Request timed out after ${timeoutMs}ms`, 'transport', true);
}
