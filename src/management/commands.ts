import { InvalidCommandParameterError } from '../utils/errors.js';

export const AUTH_REALM = 'Auth';

export const HANDSHAKE_COMMANDS = ['state on', 'log on', 'hold release'] as const;

export const TERMINATE_COMMAND = 'signal SIGTERM';

/**
 * Quote a parameter for the management command tokenizer. Bare values pass
 * through; values with whitespace, quotes or backslashes are double-quoted
 * with backslash escapes.
 */
export function quoteParameter(value: string): string {
  if (value !== '' && !/[\s"\\]/.test(value)) {
    return value;
  }
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

// A line break would end the command early and start another one
function assertSingleLine(parameter: string, value: string): void {
  if (/[\r\n]/.test(value)) {
    throw new InvalidCommandParameterError(parameter, 'line breaks are not allowed');
  }
}

export function usernameCommand(username: string): string {
  assertSingleLine('username', username);
  return `username "${AUTH_REALM}" ${quoteParameter(username)}`;
}

export function passwordCommand(password: string): string {
  assertSingleLine('password', password);
  return `password "${AUTH_REALM}" ${quoteParameter(password)}`;
}
