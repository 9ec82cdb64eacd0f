import { describe, it, expect } from 'vitest';
import { parseCliArgs } from './args.js';

describe('parseCliArgs', () => {
  it('shows help without arguments', () => {
    expect(parseCliArgs([])).toEqual({ type: 'help' });
    expect(parseCliArgs(['--help'])).toEqual({ type: 'help' });
  });

  it('parses list and its alias', () => {
    expect(parseCliArgs(['list'])).toEqual({ type: 'list' });
    expect(parseCliArgs(['ls'])).toEqual({ type: 'list' });
  });

  it('parses import with its file', () => {
    expect(parseCliArgs(['import', './office.ovpn'])).toEqual({ type: 'import', file: './office.ovpn' });
    expect(parseCliArgs(['import'])).toEqual({
      type: 'invalid',
      message: 'Usage: vpn-console import <file.ovpn>',
    });
  });

  it('parses connect with flags in any position', () => {
    expect(parseCliArgs(['connect', 'office'])).toEqual({ type: 'connect', name: 'office', verbose: false });
    expect(parseCliArgs(['connect', '--verbose', 'office'])).toEqual({
      type: 'connect',
      name: 'office',
      verbose: true,
    });
    expect(parseCliArgs(['CONNECT', '-v'])).toEqual({
      type: 'invalid',
      message: 'Usage: vpn-console connect <name> [--verbose]',
    });
  });

  it('parses history limits', () => {
    expect(parseCliArgs(['history'])).toEqual({ type: 'history', limit: 10 });
    expect(parseCliArgs(['history', '--limit', '3'])).toEqual({ type: 'history', limit: 3 });
    expect(parseCliArgs(['history', '-n', 'zero'])).toEqual({
      type: 'invalid',
      message: 'History limit must be a positive integer',
    });
  });

  it('reports unknown commands as typed', () => {
    expect(parseCliArgs(['Fly'])).toEqual({ type: 'unknown', command: 'Fly' });
  });
});
