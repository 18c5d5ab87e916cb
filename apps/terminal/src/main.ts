import readline from 'node:readline';
import { Command } from 'commander';
import {
  buildSystemPrompt,
  createConversationController,
  createFakeListTransport,
  createOpenRouterTransport,
  createStreamingSession,
  getFakeScenario,
  listModels,
  type ChatTransport,
} from '@codepane/chat-core';
import type { AppSettings } from '@codepane/shared-types';
import {
  createCredentialStore,
  createEncryptionService,
  createFileHistoryStore,
  createJsonFileStore,
  getDataDir,
  historyDir,
  loadSettings,
  redactSecrets,
  saveSettings,
  settingsPath,
} from '@codepane/storage-local';
import { createTerminalApp, resolveSelectedKey, type SettingsAccess } from './app';
import { HELP_TEXT } from './renderer';
import { isLocalDevBaseUrl, readRuntimeOverrides } from './runtime-overrides';

interface CliOptions {
  scenario?: string;
  dataDir?: string;
  model?: string;
  verbose?: boolean;
}

const FAKE_API_KEY = 'offline';

function quietLogs(): void {
  const noop = (): void => undefined;
  console.info = noop;
  console.debug = noop;
}

async function run(options: CliOptions): Promise<void> {
  if (!options.verbose) {
    quietLogs();
  }

  const env = options.dataDir ? { ...process.env, CODEPANE_DATA_DIR: options.dataDir } : process.env;
  const overrides = readRuntimeOverrides(env);
  const dataDir = getDataDir(env);

  const store = createJsonFileStore(settingsPath(dataDir));
  let current: AppSettings = loadSettings(store);
  const settings: SettingsAccess = {
    get: () => current,
    update: (patch) => {
      current = saveSettings(patch, store);
      return current;
    },
  };
  if (options.model) {
    settings.update({ model: options.model });
  }

  const credentials = createCredentialStore(store, createEncryptionService(store));
  const historyStore = createFileHistoryStore(historyDir(dataDir));

  const scenarioName = options.scenario ?? overrides.fakeScenario;
  const baseUrl = overrides.openRouterBaseUrl;
  if (baseUrl && !baseUrl.startsWith('https://') && !isLocalDevBaseUrl(baseUrl)) {
    console.warn('[codepane][config] base URL is not https; API keys will be sent unencrypted', { baseUrl });
  }
  const transport: ChatTransport = scenarioName
    ? createFakeListTransport(getFakeScenario(scenarioName))
    : createOpenRouterTransport({ baseUrl, extraHeaders: { 'X-Title': 'codepane' } });

  const { prompt, unresolvedPlaceholders } = await buildSystemPrompt({
    vars: { RESPONSE_LANGUAGE: current.responseLanguage },
  });
  if (unresolvedPlaceholders.length > 0) {
    console.warn('[codepane][prompts] unresolved placeholders in system prompt', { unresolvedPlaceholders });
  }

  console.info('[codepane][app] starting', redactSecrets({ dataDir, scenario: scenarioName, ...current }));

  const controller = createConversationController({
    session: createStreamingSession({ transport, requestTimeoutMs: overrides.requestTimeoutMs }),
    systemPrompt: prompt,
    resolveApiKey: () => resolveSelectedKey(credentials, current, scenarioName ? FAKE_API_KEY : null),
    getParameters: () => ({ model: current.model, temperature: current.temperature, maxTokens: current.maxTokens }),
    historyStore,
    historyWindow: current.historyWindow,
    continuationMode: current.continuationMode,
  });

  const app = createTerminalApp({
    controller,
    historyStore,
    credentials,
    settings,
    listModels: (freeOnly) => listModels({ freeOnly }, { baseUrl }),
    output: { write: (text) => process.stdout.write(text) },
  });

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });
  process.stdout.write(`codepane ${scenarioName ? `(offline scenario: ${scenarioName}) ` : ''}using ${current.model}\n`);
  process.stdout.write(`${HELP_TEXT}\n`);
  rl.prompt();

  rl.on('line', (line) => {
    app
      .handleLine(line)
      .then((result) => {
        if (result === 'quit') {
          rl.close();
          return;
        }
        rl.prompt();
      })
      .catch((error: unknown) => {
        console.error('[codepane][app] command failed', { reason: (error as Error).message });
        rl.prompt();
      });
  });

  rl.on('SIGINT', () => {
    if (controller.isBusy()) {
      controller.cancel();
      return;
    }
    rl.close();
  });

  await new Promise<void>((resolve) => rl.once('close', resolve));
  controller.cancel();
  await app.idle();
  await controller.whenPersisted();
  app.dispose();
}

const program = new Command();

program
  .name('codepane')
  .description('Streaming chat with OpenRouter models that collects the code blocks it answers with')
  .option('-s, --scenario <name>', 'answer from a built-in offline scenario instead of the network')
  .option('-d, --data-dir <path>', 'directory for settings, keys and saved conversations')
  .option('-m, --model <id>', 'model to use, saved as the new default')
  .option('-v, --verbose', 'print info and debug logs')
  .action(async (options: CliOptions) => {
    await run(options);
  });

await program.parseAsync(process.argv);
