import { ProtocolParseError } from '../utils/errors.js';
import type {
  LogLevel,
  ManagementEvent,
  SessionState,
  StateChangedEvent,
  LogLineEvent,
} from './types.js';

const STATE_PREFIX = '>STATE:';
const LOG_PREFIX = '>LOG:';
const PASSWORD_PREFIX = '>PASSWORD:';
const FATAL_PREFIX = '>FATAL:';

const STATE_TOKENS: Record<string, SessionState> = {
  CONNECTING: 'connecting',
  RESOLVE: 'connecting',
  TCP_CONNECT: 'connecting',
  GET_CONFIG: 'connecting',
  ASSIGN_IP: 'connecting',
  ADD_ROUTES: 'connecting',
  WAIT: 'waiting',
  AUTH: 'waiting',
  AUTH_PENDING: 'waiting',
  CONNECTED: 'connected',
  RECONNECTING: 'reconnecting',
  EXITING: 'exiting',
};

export function mapStateToken(token: string): SessionState {
  return Object.hasOwn(STATE_TOKENS, token) ? STATE_TOKENS[token] : 'unknown';
}

/**
 * Map the flags field of a real-time log message to a level.
 * F = fatal, N = non-fatal error, W = warning, D = debug, I = informational.
 */
export function logLevelFromFlags(flags: string): LogLevel {
  if (flags.includes('F') || flags.includes('N')) return 'error';
  if (flags.includes('W')) return 'warn';
  if (flags.includes('D')) return 'debug';
  return 'info';
}

function parseState(line: string): StateChangedEvent {
  const fields = line.slice(STATE_PREFIX.length).split(',');
  if (fields.length < 2) {
    throw new ProtocolParseError('state message has no state token', line);
  }

  const token = fields[1];
  const state = mapStateToken(token);
  const description = fields[2] ?? '';

  if (state !== 'connected') {
    return { type: 'stateChanged', state, token, description, peer: null };
  }

  if (fields.length < 5) {
    throw new ProtocolParseError(`connected state has ${fields.length} fields, expected at least 5`, line);
  }

  return {
    type: 'stateChanged',
    state,
    token,
    description,
    peer: {
      localAddress: fields[3] || undefined,
      remoteAddress: fields[4] || undefined,
    },
  };
}

function parseLog(line: string): LogLineEvent {
  // Only the first two commas separate fields; the message keeps its own
  const first = line.indexOf(',');
  const second = first === -1 ? -1 : line.indexOf(',', first + 1);
  if (second === -1) {
    throw new ProtocolParseError('log message has fewer than 3 fields', line);
  }

  const flags = line.slice(first + 1, second);
  return {
    type: 'log',
    text: line.slice(second + 1),
    level: logLevelFromFlags(flags),
    flags,
  };
}

/**
 * Interpret one line from the management interface.
 *
 * Returns null for lines that carry no event (command replies, banners and
 * message types this client does not handle). Throws ProtocolParseError for a
 * known message type whose fields are incomplete.
 */
export function parseManagementLine(rawLine: string): ManagementEvent | null {
  const line = rawLine.trim();

  if (line.startsWith(STATE_PREFIX)) {
    return parseState(line);
  }

  if (line.startsWith(LOG_PREFIX)) {
    return parseLog(line);
  }

  if (line.startsWith(PASSWORD_PREFIX)) {
    return {
      type: 'credentialsRequested',
      verificationFailed: line.slice(PASSWORD_PREFIX.length).startsWith('Verification Failed'),
    };
  }

  if (line.startsWith(FATAL_PREFIX)) {
    return {
      type: 'log',
      text: line.slice(FATAL_PREFIX.length),
      level: 'error',
      flags: 'F',
    };
  }

  return null;
}
