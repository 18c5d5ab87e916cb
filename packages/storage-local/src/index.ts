export * from './credentials';
export * from './encryption';
export * from './history-store';
export * from './key-value';
export * from './paths';
export * from './redaction';
export * from './settings';
