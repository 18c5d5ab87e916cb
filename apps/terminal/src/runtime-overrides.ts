export const BASE_URL_ENV = 'CODEPANE_OPENROUTER_BASE_URL';
export const SCENARIO_ENV = 'CODEPANE_FAKE_SCENARIO';
export const TIMEOUT_ENV = 'CODEPANE_REQUEST_TIMEOUT_MS';

export interface RuntimeOverrides {
  openRouterBaseUrl?: string;
  /** Runs against the in-process fake transport instead of the network. */
  fakeScenario?: string;
  requestTimeoutMs?: number;
}

function readEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value || undefined;
}

function readTimeout(env: NodeJS.ProcessEnv): number | undefined {
  const raw = readEnvValue(env, TIMEOUT_ENV);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    console.warn('[codepane][config] ignoring invalid request timeout', { [TIMEOUT_ENV]: raw });
    return undefined;
  }
  return value;
}

export function isLocalDevBaseUrl(baseUrl?: string): boolean {
  return Boolean(baseUrl) && (!!baseUrl?.startsWith('http://localhost') || !!baseUrl?.startsWith('http://127.0.0.1'));
}

export function readRuntimeOverrides(env: NodeJS.ProcessEnv = process.env): RuntimeOverrides {
  return {
    openRouterBaseUrl: readEnvValue(env, BASE_URL_ENV)?.replace(/\/+$/, ''),
    fakeScenario: readEnvValue(env, SCENARIO_ENV),
    requestTimeoutMs: readTimeout(env),
  };
}
