export * from './chat';
export * from './errors';
export * from './events';
export * from './llm';
export * from './settings';
