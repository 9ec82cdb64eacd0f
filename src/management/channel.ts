import { connect, type Socket } from 'net';
import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import { LineFramer } from './framer.js';
import { logger } from '../utils/logger.js';
import { AlreadyConnectedError, ConnectionError, NotConnectedError } from '../utils/errors.js';
import type { ChannelCloseInfo, ManagementChannelEvents } from './types.js';

const log = logger.child({ component: 'management-channel' });

// The management port only opens once the VPN process has parsed its options
const RETRYABLE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET']);
const RETRY_DELAY_MS = 100;

export interface ControlChannel extends EventEmitter<ManagementChannelEvents> {
  connect(host: string, port: number, timeoutMs: number, signal?: AbortSignal): Promise<void>;
  send(command: string): void;
  disconnect(): void;
  isConnected(): boolean;
}

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

function abortReason(signal: AbortSignal, endpoint: { host: string; port: number }): Error {
  return signal.reason instanceof Error ? signal.reason : new ConnectionError('aborted', endpoint);
}

function openSocket(host: string, port: number, timeoutMs: number, signal?: AbortSignal): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = connect(port, host);

    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      socket.off('connect', onConnect);
      socket.off('error', onError);
    };
    const onConnect = (): void => {
      cleanup();
      resolve(socket);
    };
    const onError = (err: Error): void => {
      cleanup();
      socket.destroy();
      reject(err);
    };
    const onAbort = (): void => {
      if (signal) onError(abortReason(signal, { host, port }));
    };
    const timer = setTimeout(() => {
      onError(new Error(`timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    signal?.addEventListener('abort', onAbort, { once: true });

    socket.once('connect', onConnect);
    socket.once('error', onError);
  });
}

/**
 * Line-oriented TCP client for the VPN management interface.
 *
 * Emits one `line` event per complete line, in the order the lines arrived,
 * and a single `close` event when the connection ends.
 */
export class ManagementChannel extends EventEmitter<ManagementChannelEvents> implements ControlChannel {
  private socket: Socket | null = null;
  private readonly framer = new LineFramer();
  private closing = false;

  isConnected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  async connect(host: string, port: number, timeoutMs: number, signal?: AbortSignal): Promise<void> {
    if (this.socket) {
      throw new AlreadyConnectedError();
    }

    const endpoint = { host, port };
    const deadline = Date.now() + timeoutMs;
    let attempts = 0;

    for (;;) {
      attempts++;
      if (signal?.aborted) {
        throw abortReason(signal, endpoint);
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new ConnectionError(`no answer within ${timeoutMs}ms`, endpoint);
      }

      try {
        const socket = await openSocket(host, port, remaining, signal);
        this.attach(socket);
        log.info({ host, port, attempts }, 'Connected to management interface');
        return;
      } catch (err) {
        if (signal?.aborted) {
          throw abortReason(signal, endpoint);
        }
        const error = err instanceof Error ? err : new Error(String(err));
        const code = errorCode(error);
        if (code && RETRYABLE_CODES.has(code) && deadline - Date.now() > RETRY_DELAY_MS) {
          log.debug({ host, port, code, attempts }, 'Management interface not ready yet');
          await delay(RETRY_DELAY_MS, undefined, { signal }).catch((delayErr: unknown) => {
            throw signal?.aborted ? abortReason(signal, endpoint) : delayErr;
          });
          continue;
        }
        log.warn({ host, port, attempts, err: error }, 'Could not connect to management interface');
        throw new ConnectionError(error.message, endpoint, error);
      }
    }
  }

  send(command: string): void {
    if (!this.socket || this.socket.destroyed) {
      throw new NotConnectedError(command.split(' ')[0]);
    }

    log.debug({ command: command.split(' ')[0] }, 'Sending management command');
    this.socket.write(command + '\n');
  }

  disconnect(): void {
    if (!this.socket) {
      return;
    }

    log.debug('Disconnecting from management interface');
    const socket = this.socket;
    this.closing = true;
    socket.destroy();
    this.finish(socket, { requested: true });
  }

  private attach(socket: Socket): void {
    this.socket = socket;
    this.closing = false;
    this.framer.reset();

    socket.on('data', (chunk: Buffer) => {
      this.handleData(socket, chunk);
    });

    socket.on('error', (err: Error) => {
      log.warn({ err }, 'Management connection error');
      this.finish(socket, { requested: this.closing, error: err });
    });

    socket.on('close', () => {
      this.finish(socket, { requested: this.closing });
    });
  }

  private handleData(socket: Socket, chunk: Buffer): void {
    for (const line of this.framer.push(chunk)) {
      // A listener may have torn the channel down mid-chunk
      if (this.socket !== socket) return;
      this.emit('line', line);
    }
  }

  private finish(socket: Socket, info: ChannelCloseInfo): void {
    if (this.socket !== socket) {
      return;
    }

    socket.removeAllListeners('data');
    this.socket = null;
    this.framer.reset();
    this.emit('close', info);
  }
}
