export type Command =
  | { kind: 'message'; text: string }
  | { kind: 'continue' }
  | { kind: 'stop' }
  | { kind: 'clear' }
  | { kind: 'save'; name?: string }
  | { kind: 'load'; file: string }
  | { kind: 'history' }
  | { kind: 'history-clear' }
  | { kind: 'models' }
  | { kind: 'model'; id: string }
  | { kind: 'keys' }
  | { kind: 'key-add'; label: string; secret: string }
  | { kind: 'key-use'; label: string }
  | { kind: 'key-remove'; label: string }
  | { kind: 'temp'; value: number }
  | { kind: 'tokens'; value: number }
  | { kind: 'attach'; path: string }
  | { kind: 'blocks' }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'invalid'; reason: string };

const NO_ARGUMENT_COMMANDS = {
  '/continue': 'continue',
  '/stop': 'stop',
  '/clear': 'clear',
  '/models': 'models',
  '/keys': 'keys',
  '/blocks': 'blocks',
  '/help': 'help',
  '/quit': 'quit',
  '/exit': 'quit',
} as const;

function isNoArgumentCommand(name: string): name is keyof typeof NO_ARGUMENT_COMMANDS {
  return Object.prototype.hasOwnProperty.call(NO_ARGUMENT_COMMANDS, name);
}

function parseNumber(raw: string | undefined, name: string): Command | number {
  const value = raw === undefined ? Number.NaN : Number(raw);
  return Number.isFinite(value) ? value : { kind: 'invalid', reason: `${name} needs a number` };
}

function parseKeyCommand(args: string[]): Command {
  const [action, label, ...rest] = args;
  if (action === 'add') {
    const secret = rest.join(' ').trim();
    return label && secret ? { kind: 'key-add', label, secret } : { kind: 'invalid', reason: 'Usage: /key add <label> <secret>' };
  }
  if (action === 'use' || action === 'remove') {
    if (!label) {
      return { kind: 'invalid', reason: `Usage: /key ${action} <label>` };
    }
    return action === 'use' ? { kind: 'key-use', label } : { kind: 'key-remove', label };
  }
  return { kind: 'invalid', reason: 'Usage: /key add|use|remove <label>' };
}

/** Lines starting with `/` are commands; anything else is a message to the model. */
export function parseCommand(line: string): Command {
  const trimmed = line.trim();
  if (!trimmed.startsWith('/')) {
    return { kind: 'message', text: line };
  }

  const [name = '', ...args] = trimmed.split(/\s+/);
  const rest = trimmed.slice(name.length).trim();
  const lowered = name.toLowerCase();

  if (isNoArgumentCommand(lowered)) {
    return { kind: NO_ARGUMENT_COMMANDS[lowered] };
  }

  switch (lowered) {
    case '/save':
      return rest ? { kind: 'save', name: rest } : { kind: 'save' };
    case '/history':
      if (!rest) return { kind: 'history' };
      return rest.toLowerCase() === 'clear'
        ? { kind: 'history-clear' }
        : { kind: 'invalid', reason: 'Usage: /history [clear]' };
    case '/load':
      return rest ? { kind: 'load', file: rest } : { kind: 'invalid', reason: 'Usage: /load <file>' };
    case '/model':
      return rest ? { kind: 'model', id: rest } : { kind: 'invalid', reason: 'Usage: /model <id>' };
    case '/attach':
      return rest ? { kind: 'attach', path: rest } : { kind: 'invalid', reason: 'Usage: /attach <path>' };
    case '/key':
      return parseKeyCommand(args);
    case '/temp': {
      const value = parseNumber(args[0], '/temp');
      return typeof value === 'number' ? { kind: 'temp', value } : value;
    }
    case '/tokens': {
      const value = parseNumber(args[0], '/tokens');
      return typeof value === 'number' ? { kind: 'tokens', value } : value;
    }
    default:
      return { kind: 'invalid', reason: `Unknown command ${name}; type /help for the list` };
  }
}
