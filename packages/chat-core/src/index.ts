export * from './code-fence/languages';
export * from './code-fence/scanner';
export * from './conversation/controller';
export * from './conversation/types';
export * from './llm/contracts';
export * from './llm/fake-list/adapter';
export * from './llm/fake-list/scenario';
export * from './llm/openrouter/adapter';
export * from './llm/openrouter/client';
export * from './llm/openrouter/errors';
export * from './llm/openrouter/models';
export * from './llm/openrouter/stream';
export * from './prompts/loader';
export * from './session/channel';
export * from './session/coalescer';
export * from './session/retry';
export * from './session/streaming-session';
export * from './worker/protocol';
export * from './worker/stream-reader';
