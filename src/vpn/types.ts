import type { EventEmitter } from 'events';

export interface LaunchRequest {
  command: string;
  args: string[];
  cwd?: string;
}

export type VpnProcessStatus = 'starting' | 'running' | 'exited';

export interface VpnProcessEvents {
  started: [pid: number];
  output: [text: string];
  exit: [code: number | null];
}

export interface VpnProcess extends EventEmitter<VpnProcessEvents> {
  readonly pid: number | null;
  getStatus(): VpnProcessStatus;
  isRunning(): boolean;
  /** Resolves true once the process is running, false if it exited or the wait ran out. */
  waitForStarted(timeoutMs: number): Promise<boolean>;
  /** Resolves true once the process has exited, false if the wait ran out. */
  waitForExit(timeoutMs: number): Promise<boolean>;
  kill(): void;
}

export interface ProcessLauncher {
  launch(request: LaunchRequest): VpnProcess;
}
