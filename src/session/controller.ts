import { EventEmitter } from 'events';
import path from 'path';
import { nanoid } from 'nanoid';
import { parseManagementLine } from '../management/parser.js';
import {
  HANDSHAKE_COMMANDS,
  TERMINATE_COMMAND,
  passwordCommand,
  usernameCommand,
} from '../management/commands.js';
import type { ControlChannel } from '../management/channel.js';
import type {
  ChannelCloseInfo,
  LogLevel,
  ManagementEvent,
  PeerInfo,
  SessionState,
  StateChangedEvent,
} from '../management/types.js';
import { OutputTail } from '../vpn/console-output.js';
import type { ProcessLauncher, VpnProcess } from '../vpn/types.js';
import { createChildLogger, logger } from '../utils/logger.js';
import {
  AlreadyConnectedError,
  ConnectionError,
  NotConnectedError,
  ProcessSpawnError,
  ProtocolParseError,
} from '../utils/errors.js';
import type {
  LogSource,
  SessionControllerEvents,
  SessionControllerOptions,
  SessionEndReason,
  SessionLogLine,
  SessionRecorder,
  SessionSnapshot,
} from './types.js';

const log = logger.child({ component: 'session-controller' });

type Phase = 'idle' | 'starting' | 'active' | 'stopping';

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Owns the single VPN session: the elevated process, the management channel
 * and the state reported through it.
 *
 * Every failure is reported to listeners as a `log` event. Only `start()`
 * additionally rejects, so callers can tell the attempt failed.
 */
export class SessionController extends EventEmitter<SessionControllerEvents> {
  private phase: Phase = 'idle';
  private process: VpnProcess | null = null;
  private channel: ControlChannel | null = null;
  private startAbort: AbortController | null = null;
  private stopping: Promise<void> | null = null;
  private outputTail = new OutputTail();

  private sessionId: string | null = null;
  private configPath: string | null = null;
  private state: SessionState = 'disconnected';
  private token = 'DISCONNECTED';
  private peer: PeerInfo | null = null;
  private since = new Date().toISOString();

  constructor(
    private readonly launcher: ProcessLauncher,
    private readonly createChannel: () => ControlChannel,
    private readonly options: SessionControllerOptions,
    private readonly recorder?: SessionRecorder
  ) {
    super();
  }

  getSnapshot(): SessionSnapshot {
    return {
      sessionId: this.sessionId,
      configPath: this.configPath,
      state: this.state,
      token: this.token,
      peer: this.peer ? { ...this.peer } : null,
      since: this.since,
    };
  }

  isActive(): boolean {
    return this.phase !== 'idle';
  }

  /**
   * Launch the VPN process for a configuration file and attach to its
   * management interface. Throws AlreadyConnectedError synchronously while
   * another session is starting, running or stopping.
   */
  start(configPath: string): Promise<void> {
    if (this.phase !== 'idle') {
      throw new AlreadyConnectedError(this.sessionId ?? undefined);
    }

    const sessionId = nanoid();
    this.phase = 'starting';
    this.sessionId = sessionId;
    this.configPath = configPath;
    this.outputTail = new OutputTail();
    this.startAbort = new AbortController();

    log.info({ sessionId, configPath }, 'Starting session');
    this.record((recorder) => recorder.sessionStarted(sessionId, configPath));

    return this.run(sessionId, configPath, this.startAbort.signal);
  }

  stop(): Promise<void> {
    if (this.phase === 'idle') {
      log.debug('Stop requested without an active session');
      return Promise.resolve();
    }

    if (!this.stopping) {
      this.stopping = this.shutdown().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  submitCredentials(username: string, password: string): void {
    if (!this.channel || !this.channel.isConnected()) {
      throw new NotConnectedError('username');
    }

    const commands = [usernameCommand(username), passwordCommand(password)];
    for (const command of commands) {
      this.channel.send(command);
    }
    log.info({ sessionId: this.sessionId }, 'Submitted credentials');
  }

  private async run(sessionId: string, configPath: string, signal: AbortSignal): Promise<void> {
    const sessionLog = createChildLogger({ component: 'session-controller', sessionId });
    const { host, port } = this.options;

    try {
      await this.launchProcess(configPath);
      this.assertStarting(sessionId);

      const channel = this.createChannel();
      await channel.connect(host, port, this.options.connectTimeoutMs, signal);
      if (this.phase !== 'starting' || this.sessionId !== sessionId) {
        channel.disconnect();
        throw new ConnectionError('start aborted', { host, port });
      }
      this.attachChannel(channel);

      // Subscriptions go first so nothing emitted after the hold is lost
      for (const command of HANDSHAKE_COMMANDS) {
        channel.send(command);
      }

      this.phase = 'active';
      this.startAbort = null;
      sessionLog.info({ host, port }, 'Session started');
      this.emit('sessionStarted', this.getSnapshot());
    } catch (err) {
      const error = toError(err);
      if (this.phase === 'starting' && this.sessionId === sessionId) {
        sessionLog.error({ err: error }, 'Session start failed');
        this.emitLog('error', error.message);
        this.phase = 'stopping';
        this.startAbort = null;
        this.stopping = this.terminateProcess()
          .then(() => this.teardown('start-failed'))
          .finally(() => {
            this.stopping = null;
          });
        await this.stopping;
      }
      throw error;
    }
  }

  private async launchProcess(configPath: string): Promise<void> {
    const { binary, elevationCommand, host, port, spawnTimeoutMs } = this.options;
    const args = [binary, '--config', configPath, '--management', host, String(port)];
    // Relative ca/cert/key paths resolve against the working directory
    const cwd = path.dirname(configPath);

    let child: VpnProcess;
    try {
      child = this.launcher.launch({ command: elevationCommand, args, cwd });
    } catch (err) {
      const error = toError(err);
      throw error instanceof ProcessSpawnError ? error : new ProcessSpawnError(error.message, error);
    }

    this.process = child;
    let exitCode: number | null = null;
    child.on('output', (text) => {
      for (const line of this.outputTail.append(text)) {
        log.debug({ sessionId: this.sessionId, line }, 'VPN process output');
      }
    });
    child.on('exit', (code) => {
      exitCode = code;
      this.handleProcessExit(child, code);
    });

    const started = await child.waitForStarted(spawnTimeoutMs);
    if (!started) {
      throw child.getStatus() === 'exited'
        ? new ProcessSpawnError(this.describeExit(exitCode))
        : new ProcessSpawnError(`not started within ${spawnTimeoutMs}ms`);
    }
  }

  private assertStarting(sessionId: string): void {
    if (this.phase !== 'starting' || this.sessionId !== sessionId) {
      throw new ConnectionError('start aborted', { host: this.options.host, port: this.options.port });
    }
  }

  private attachChannel(channel: ControlChannel): void {
    this.channel = channel;
    channel.on('line', (line) => {
      this.handleLine(line);
    });
    channel.on('close', (info) => {
      this.handleChannelClose(channel, info);
    });
  }

  private parseLine(line: string): ManagementEvent | null {
    try {
      return parseManagementLine(line);
    } catch (err) {
      if (err instanceof ProtocolParseError) {
        log.debug({ err, sessionId: this.sessionId }, 'Dropping malformed management line');
        return null;
      }
      throw err;
    }
  }

  private handleLine(line: string): void {
    const event = this.parseLine(line);
    if (!event) {
      log.trace({ line }, 'Ignoring management line');
      return;
    }

    switch (event.type) {
      case 'stateChanged':
        this.applyState(event);
        break;
      case 'log':
        this.emitLog(event.level, event.text, 'vpn');
        break;
      case 'credentialsRequested':
        if (this.sessionId) {
          log.info({ sessionId: this.sessionId, verificationFailed: event.verificationFailed }, 'Credentials requested');
          this.emit('credentialsRequested', {
            sessionId: this.sessionId,
            verificationFailed: event.verificationFailed,
          });
        }
        break;
    }
  }

  private applyState(event: StateChangedEvent): void {
    log.info({ sessionId: this.sessionId, state: event.state, token: event.token }, 'State changed');
    this.setState(event.state, event.token, event.state === 'connected' ? event.peer : null);
  }

  private setState(state: SessionState, token: string, peer: PeerInfo | null): void {
    this.state = state;
    this.token = token;
    this.peer = peer;
    this.since = new Date().toISOString();

    const snapshot = this.getSnapshot();
    const sessionId = this.sessionId;
    if (sessionId) {
      this.record((recorder) => recorder.stateChanged(sessionId, snapshot));
    }
    this.emit('stateChanged', snapshot);
  }

  private handleProcessExit(child: VpnProcess, code: number | null): void {
    if (child !== this.process) {
      return;
    }

    switch (this.phase) {
      case 'starting':
        this.startAbort?.abort(new ProcessSpawnError(this.describeExit(code)));
        break;
      case 'active':
        this.emitLog('warn', this.describeExit(code));
        this.teardown('process-exited');
        break;
      default:
        log.debug({ sessionId: this.sessionId, code }, 'VPN process exited');
    }
  }

  private handleChannelClose(channel: ControlChannel, info: ChannelCloseInfo): void {
    if (channel !== this.channel || info.requested || this.phase !== 'active') {
      return;
    }

    const reason = info.error ? `: ${info.error.message}` : '';
    this.emitLog('warn', `Lost connection to the VPN management interface${reason}`);
    this.teardown('connection-lost');
  }

  private async shutdown(): Promise<void> {
    log.info({ sessionId: this.sessionId, phase: this.phase }, 'Stopping session');
    this.phase = 'stopping';
    this.startAbort?.abort(new ConnectionError('start aborted by stop', {
      host: this.options.host,
      port: this.options.port,
    }));

    await this.terminateProcess();
    this.teardown('stopped');
  }

  /**
   * Ask the VPN process to exit over the management channel, or kill it when
   * the channel is not up, and wait at most `exitTimeoutMs` for the exit.
   */
  private async terminateProcess(): Promise<void> {
    const child = this.process;
    if (!child || child.getStatus() === 'exited') {
      return;
    }

    const channel = this.channel;
    if (channel && channel.isConnected()) {
      channel.send(TERMINATE_COMMAND);
    } else {
      child.kill();
    }

    const exited = await child.waitForExit(this.options.exitTimeoutMs);
    if (!exited) {
      this.emitLog('warn', `VPN process did not exit within ${this.options.exitTimeoutMs}ms`);
    }
  }

  private teardown(reason: SessionEndReason): void {
    const sessionId = this.sessionId;

    if (this.channel) {
      const channel = this.channel;
      this.channel = null;
      channel.removeAllListeners();
      channel.disconnect();
    }

    if (this.process) {
      this.process.removeAllListeners();
      this.process = null;
    }

    if (this.state !== 'disconnected') {
      this.setState('disconnected', 'DISCONNECTED', null);
    }

    this.phase = 'idle';
    this.startAbort = null;
    this.sessionId = null;
    this.configPath = null;

    if (sessionId) {
      log.info({ sessionId, reason }, 'Session ended');
      this.record((recorder) => recorder.sessionEnded(sessionId, reason));
      this.emit('sessionEnded', sessionId, reason);
    }
  }

  private describeExit(code: number | null): string {
    const detail = this.outputTail.lastLine();
    const status = code === null ? 'VPN process exited' : `VPN process exited with code ${code}`;
    return detail ? `${status}: ${detail}` : status;
  }

  private emitLog(level: LogLevel, text: string, source: LogSource = 'controller'): void {
    const line: SessionLogLine = { text, level, source, timestamp: new Date().toISOString() };
    const sessionId = this.sessionId;
    if (sessionId) {
      this.record((recorder) => recorder.logLine(sessionId, line));
    }
    this.emit('log', line);
  }

  private record(write: (recorder: SessionRecorder) => void): void {
    if (!this.recorder) return;
    try {
      write(this.recorder);
    } catch (err) {
      log.error({ err, sessionId: this.sessionId }, 'Session recorder failed');
    }
  }
}
