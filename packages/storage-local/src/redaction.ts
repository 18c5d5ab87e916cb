const SENSITIVE_KEYS = ['apikey', 'api_key', 'token', 'secret', 'credential', 'authorization', 'password'];

const BEARER_PATTERN = /\bBearer\s+[^\s"']+/gi;

function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => normalized.includes(sensitive));
}

export function redactSecrets<T>(value: T): T {
  if (typeof value === 'string') {
    return value.replace(BEARER_PATTERN, 'Bearer •••') as T;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSecrets(item)) as T;
  }

  if (value && typeof value === 'object') {
    const output: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value as Record<string, unknown>)) {
      output[key] = isSensitiveKey(key) ? '•••' : redactSecrets(item);
    }
    return output as T;
  }

  return value;
}
