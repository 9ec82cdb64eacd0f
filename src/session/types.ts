import type { LogLevel, PeerInfo, SessionState } from '../management/types.js';

export interface SessionSnapshot {
  sessionId: string | null;
  configPath: string | null;
  state: SessionState;
  token: string;
  peer: PeerInfo | null;
  // ISO timestamp of the last state change
  since: string;
}

export type LogSource = 'vpn' | 'controller';

export interface SessionLogLine {
  text: string;
  level: LogLevel;
  source: LogSource;
  timestamp: string;
}

export interface CredentialRequest {
  sessionId: string;
  verificationFailed: boolean;
}

export type SessionEndReason = 'stopped' | 'process-exited' | 'connection-lost' | 'start-failed';

export interface SessionControllerEvents {
  stateChanged: [snapshot: SessionSnapshot];
  log: [line: SessionLogLine];
  credentialsRequested: [request: CredentialRequest];
  sessionStarted: [snapshot: SessionSnapshot];
  sessionEnded: [sessionId: string, reason: SessionEndReason];
}

export interface SessionControllerOptions {
  binary: string;
  elevationCommand: string;
  host: string;
  port: number;
  spawnTimeoutMs: number;
  connectTimeoutMs: number;
  exitTimeoutMs: number;
}

/**
 * Receives the lifecycle of every session, e.g. to keep a connection history.
 */
export interface SessionRecorder {
  sessionStarted(sessionId: string, configPath: string): void;
  stateChanged(sessionId: string, snapshot: SessionSnapshot): void;
  logLine(sessionId: string, line: SessionLogLine): void;
  sessionEnded(sessionId: string, reason: SessionEndReason): void;
}
