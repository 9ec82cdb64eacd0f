import { describe, it, expect } from 'vitest';
import { formatHistory, formatLogLine, formatStatus } from './console-view.js';
import type { SessionSnapshot } from '../session/types.js';

const base: SessionSnapshot = {
  sessionId: 'abc',
  configPath: '/configs/office/office.ovpn',
  state: 'connected',
  token: 'CONNECTED',
  peer: { localAddress: '10.0.0.2', remoteAddress: '203.0.113.5' },
  since: '2026-01-01T00:00:00.000Z',
};

describe('formatStatus', () => {
  it('shows server and address while connected', () => {
    expect(formatStatus(base)).toBe('Status: CONNECTED\nServer: 203.0.113.5\nIP:     10.0.0.2');
  });

  it('shows N/A in other states', () => {
    expect(formatStatus({ ...base, state: 'reconnecting', token: 'RECONNECTING', peer: null })).toBe(
      'Status: RECONNECTING\nServer: N/A\nIP:     N/A'
    );
  });
});

describe('formatLogLine', () => {
  it('prints info lines as they are and prefixes the rest', () => {
    const line = { text: 'Initialization Sequence Completed', source: 'vpn', timestamp: '' } as const;

    expect(formatLogLine({ ...line, level: 'info' })).toBe('Initialization Sequence Completed');
    expect(formatLogLine({ ...line, level: 'warn' })).toBe('[warn] Initialization Sequence Completed');
  });
});

describe('formatHistory', () => {
  it('describes each session on one line', () => {
    expect(
      formatHistory([
        {
          id: 'b',
          configPath: '/configs/office/office.ovpn',
          startedAt: '2026-01-02T10:00:00.000Z',
          endedAt: null,
          endReason: null,
          lastState: 'CONNECTED',
          localAddress: '10.0.0.2',
          remoteAddress: '203.0.113.5',
        },
        {
          id: 'a',
          configPath: '/configs/home/home.ovpn',
          startedAt: '2026-01-01T10:00:00.000Z',
          endedAt: '2026-01-01T11:00:00.000Z',
          endReason: 'stopped',
          lastState: 'DISCONNECTED',
          localAddress: null,
          remoteAddress: null,
        },
      ])
    ).toBe(
      '2026-01-02T10:00:00.000Z  /configs/office/office.ovpn  CONNECTED via 203.0.113.5  still open\n' +
        '2026-01-01T10:00:00.000Z  /configs/home/home.ovpn  DISCONNECTED  ended 2026-01-01T11:00:00.000Z (stopped)'
    );
  });

  it('says so when there is no history', () => {
    expect(formatHistory([])).toBe('No sessions recorded yet.');
  });
});
