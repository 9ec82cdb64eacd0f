export type SessionState =
  | 'disconnected'
  | 'connecting'
  | 'waiting'
  | 'connected'
  | 'reconnecting'
  | 'exiting'
  | 'unknown';

export interface PeerInfo {
  remoteAddress?: string;
  localAddress?: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StateChangedEvent {
  type: 'stateChanged';
  state: SessionState;
  // Raw token as sent by the VPN process, e.g. "ASSIGN_IP"
  token: string;
  description: string;
  peer: PeerInfo | null;
}

export interface LogLineEvent {
  type: 'log';
  text: string;
  level: LogLevel;
  flags: string;
}

export interface CredentialsRequestedEvent {
  type: 'credentialsRequested';
  verificationFailed: boolean;
}

export type ManagementEvent = StateChangedEvent | LogLineEvent | CredentialsRequestedEvent;

export interface ChannelCloseInfo {
  requested: boolean;
  error?: Error;
}

export interface ManagementChannelEvents {
  line: [line: string];
  close: [info: ChannelCloseInfo];
}
