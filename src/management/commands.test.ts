import { describe, it, expect } from 'vitest';
import { InvalidCommandParameterError } from '../utils/errors.js';
import { HANDSHAKE_COMMANDS, passwordCommand, quoteParameter, usernameCommand } from './commands.js';

describe('management commands', () => {
  it('subscribes before releasing the hold', () => {
    expect(HANDSHAKE_COMMANDS).toEqual(['state on', 'log on', 'hold release']);
  });

  it('builds credential commands for the Auth realm', () => {
    expect(usernameCommand('alice')).toBe('username "Auth" alice');
    expect(passwordCommand('test-secret')).toBe('password "Auth" test-secret');
  });

  it('quotes values the tokenizer would split', () => {
    expect(quoteParameter('two words')).toBe('"two words"');
    expect(quoteParameter('say "hi"')).toBe('"say \\"hi\\""');
    expect(quoteParameter('back\\slash')).toBe('"back\\\\slash"');
    expect(quoteParameter('')).toBe('""');
  });

  it('refuses values that would split the command line', () => {
    expect(() => usernameCommand('alice\nsignal SIGTERM')).toThrow(InvalidCommandParameterError);
    expect(() => passwordCommand('test-secret\r')).toThrow('Invalid password: line breaks are not allowed');
  });
});
