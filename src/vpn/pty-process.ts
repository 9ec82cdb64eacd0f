import * as pty from 'node-pty';
import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { ProcessSpawnError } from '../utils/errors.js';
import type {
  LaunchRequest,
  ProcessLauncher,
  VpnProcess,
  VpnProcessEvents,
  VpnProcessStatus,
} from './types.js';

const log = logger.child({ component: 'vpn-process' });

function waitFor(
  emitter: PtyVpnProcess,
  done: () => boolean,
  events: Array<keyof VpnProcessEvents>,
  timeoutMs: number
): Promise<boolean> {
  if (done()) {
    return Promise.resolve(true);
  }
  if (emitter.getStatus() === 'exited') {
    return Promise.resolve(false);
  }

  return new Promise<boolean>((resolve) => {
    const check = (): void => {
      if (done()) {
        finish(true);
      } else if (emitter.getStatus() === 'exited') {
        finish(false);
      }
    };
    const finish = (result: boolean): void => {
      clearTimeout(timer);
      for (const event of events) {
        emitter.off(event, check);
      }
      resolve(result);
    };
    const timer = setTimeout(() => finish(false), timeoutMs);
    for (const event of events) {
      emitter.on(event, check);
    }
  });
}

/**
 * A VPN process running behind a pseudo-terminal.
 */
export class PtyVpnProcess extends EventEmitter<VpnProcessEvents> implements VpnProcess {
  private pty: pty.IPty | null = null;
  private status: VpnProcessStatus = 'starting';

  constructor(private readonly request: LaunchRequest) {
    super();
  }

  get pid(): number | null {
    return this.pty?.pid ?? null;
  }

  getStatus(): VpnProcessStatus {
    return this.status;
  }

  isRunning(): boolean {
    return this.pty !== null && this.status === 'running';
  }

  start(): void {
    if (this.pty) {
      throw new ProcessSpawnError('Process already spawned');
    }

    const { command, args, cwd } = this.request;
    log.info({ command, args }, 'Spawning VPN process');

    try {
      this.pty = pty.spawn(command, args, {
        name: 'xterm-256color',
        cols: 120,
        rows: 40,
        cwd: cwd ?? process.cwd(),
        env: {
          ...process.env,
          TERM: 'xterm-256color',
        },
      });
    } catch (err) {
      this.status = 'exited';
      const error = err instanceof Error ? err : new Error(String(err));
      throw new ProcessSpawnError(error.message, error);
    }

    this.pty.onData((data: string) => {
      this.emit('output', data);
    });

    this.pty.onExit(({ exitCode }) => {
      this.handleExit(exitCode);
    });

    this.status = 'running';
    this.emit('started', this.pty.pid);
  }

  waitForStarted(timeoutMs: number): Promise<boolean> {
    return waitFor(this, () => this.status === 'running', ['started', 'exit'], timeoutMs);
  }

  waitForExit(timeoutMs: number): Promise<boolean> {
    return waitFor(this, () => this.status === 'exited', ['exit'], timeoutMs);
  }

  kill(): void {
    if (!this.pty) {
      return;
    }

    log.info({ pid: this.pty.pid }, 'Killing VPN process');
    try {
      this.pty.kill();
    } catch (err) {
      // The elevated child may belong to another user
      log.warn({ err, pid: this.pty.pid }, 'Could not signal VPN process');
    }
  }

  private handleExit(exitCode: number): void {
    log.info({ pid: this.pty?.pid, exitCode }, 'VPN process exited');
    this.status = 'exited';
    this.pty = null;
    this.emit('exit', exitCode);
  }
}

export class PtyProcessLauncher implements ProcessLauncher {
  launch(request: LaunchRequest): VpnProcess {
    const child = new PtyVpnProcess(request);
    child.start();
    return child;
  }
}
