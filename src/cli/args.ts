import type { CliCommand } from './types.js';

const DEFAULT_HISTORY_LIMIT = 10;

function parseHistoryLimit(args: string[]): CliCommand {
  let limit = DEFAULT_HISTORY_LIMIT;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if ((arg === '--limit' || arg === '-n') && args[i + 1]) {
      limit = parseInt(args[i + 1], 10);
      i++;
    }
  }

  if (!Number.isInteger(limit) || limit <= 0) {
    return { type: 'invalid', message: 'History limit must be a positive integer' };
  }

  return { type: 'history', limit };
}

export function parseCliArgs(argv: string[]): CliCommand {
  const [first, ...rest] = argv;
  const cmd = first?.toLowerCase();

  switch (cmd) {
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { type: 'help' };

    case 'list':
    case 'ls':
      return { type: 'list' };

    case 'import': {
      const file = rest[0];
      if (!file) {
        return { type: 'invalid', message: 'Usage: vpn-console import <file.ovpn>' };
      }
      return { type: 'import', file };
    }

    case 'connect':
    case 'up': {
      const verbose = rest.includes('--verbose') || rest.includes('-v');
      const name = rest.find(arg => !arg.startsWith('-'));
      if (!name) {
        return { type: 'invalid', message: 'Usage: vpn-console connect <name> [--verbose]' };
      }
      return { type: 'connect', name, verbose };
    }

    case 'history':
      return parseHistoryLimit(rest);

    default:
      return { type: 'unknown', command: first };
  }
}
