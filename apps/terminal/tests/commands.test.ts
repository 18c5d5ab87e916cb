import { describe, expect, it } from 'vitest';
import { parseCommand } from '../src/commands';

describe('parseCommand', () => {
  it('treats plain lines as messages, untrimmed', () => {
    expect(parseCommand('  explain closures ')).toEqual({ kind: 'message', text: '  explain closures ' });
  });

  it('parses commands without arguments case-insensitively', () => {
    expect(parseCommand('/continue')).toEqual({ kind: 'continue' });
    expect(parseCommand('/STOP')).toEqual({ kind: 'stop' });
    expect(parseCommand('/exit')).toEqual({ kind: 'quit' });
  });

  it('keeps the whole remainder for name arguments', () => {
    expect(parseCommand('/save my notes')).toEqual({ kind: 'save', name: 'my notes' });
    expect(parseCommand('/save')).toEqual({ kind: 'save' });
    expect(parseCommand('/model deepseek/deepseek-chat:free | 160K free')).toEqual({
      kind: 'model',
      id: 'deepseek/deepseek-chat:free | 160K free',
    });
    expect(parseCommand('/attach ./src/main.ts')).toEqual({ kind: 'attach', path: './src/main.ts' });
  });

  it('requires arguments where they are needed', () => {
    expect(parseCommand('/load')).toEqual({ kind: 'invalid', reason: 'Usage: /load <file>' });
    expect(parseCommand('/model')).toEqual({ kind: 'invalid', reason: 'Usage: /model <id>' });
  });

  it('parses history listing and clearing', () => {
    expect(parseCommand('/history')).toEqual({ kind: 'history' });
    expect(parseCommand('/history CLEAR')).toEqual({ kind: 'history-clear' });
    expect(parseCommand('/history wipe')).toEqual({ kind: 'invalid', reason: 'Usage: /history [clear]' });
  });

  it('parses key management', () => {
    expect(parseCommand('/key add work test-secret')).toEqual({ kind: 'key-add', label: 'work', secret: 'test-secret' });
    expect(parseCommand('/key use work')).toEqual({ kind: 'key-use', label: 'work' });
    expect(parseCommand('/key remove work')).toEqual({ kind: 'key-remove', label: 'work' });
    expect(parseCommand('/key add work')).toEqual({ kind: 'invalid', reason: 'Usage: /key add <label> <secret>' });
    expect(parseCommand('/key rotate work')).toEqual({ kind: 'invalid', reason: 'Usage: /key add|use|remove <label>' });
  });

  it('parses numeric settings', () => {
    expect(parseCommand('/temp 0.7')).toEqual({ kind: 'temp', value: 0.7 });
    expect(parseCommand('/tokens 8192')).toEqual({ kind: 'tokens', value: 8192 });
    expect(parseCommand('/temp warm')).toEqual({ kind: 'invalid', reason: '/temp needs a number' });
    expect(parseCommand('/tokens')).toEqual({ kind: 'invalid', reason: '/tokens needs a number' });
  });

  it('rejects unknown commands', () => {
    expect(parseCommand('/nope')).toEqual({ kind: 'invalid', reason: 'Unknown command /nope; type /help for the list' });
  });
});
