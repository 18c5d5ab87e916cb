import { makeCodepaneError } from '@codepane/shared-types';

export type FakeScenarioErrorCode = 'timeout' | 'network' | 'http' | 'rate_limit';

export interface FakeScenarioStep {
  id: string;
  response?: string;
  /** Defaults to `stop`. */
  finishReason?: 'stop' | 'length';
  error?: FakeScenarioErrorCode;
  /** Delay before the response body is returned. */
  delayMs?: number;
  /** Delay between streamed characters. */
  tokenDelayMs?: number;
  /** Re-slices every frame into byte chunks of this size. */
  chunkSize?: number;
}

export interface FakeScenario {
  name: string;
  /** One step per request; the last step repeats once the list runs out. */
  steps: FakeScenarioStep[];
}

export const BUILTIN_FAKE_SCENARIOS: Record<string, FakeScenario> = {
  code_answer: {
    name: 'code_answer',
    steps: [
      {
        id: 'answer-with-code',
        response:
          'Here is a helper that reverses a string:\n\n```py\ndef reverse(text):\n    return text[::-1]\n```\n\nCall it with any str.',
        chunkSize: 7,
      },
    ],
  },
  truncated_then_continue: {
    name: 'truncated_then_continue',
    steps: [
      {
        id: 'cut-inside-fence',
        response: 'Start of the answer:\n\n```ts\nexport function add(a: number, b: number) {\n',
        finishReason: 'length',
      },
      {
        id: 'continuation',
        response: '  return a + b;\n}\n```\n\nThat completes the function.',
      },
    ],
  },
  slow_answer: {
    name: 'slow_answer',
    steps: [
      {
        id: 'slow',
        response: 'This answer streams slowly so that /stop has something to interrupt.',
        tokenDelayMs: 40,
      },
    ],
  },
  rate_limited: {
    name: 'rate_limited',
    steps: [{ id: 'rate-limit', error: 'rate_limit' }],
  },
  server_error: {
    name: 'server_error',
    steps: [{ id: 'bad-gateway', error: 'http' }],
  },
  network_error: {
    name: 'network_error',
    steps: [{ id: 'offline', error: 'network' }],
  },
  timeout: {
    name: 'timeout',
    steps: [{ id: 'hang', error: 'timeout' }],
  },
};

export function getFakeScenario(name: string): FakeScenario {
  const scenario = BUILTIN_FAKE_SCENARIOS[name];
  if (!scenario) {
    throw makeCodepaneError(`Unknown fake scenario: ${name}`, 'invalid_state', false);
  }
  return scenario;
}
