import { execFileSync } from 'child_process';
import { logger } from './logger.js';
import { VpnBinaryNotInstalledError } from './errors.js';

const log = logger.child({ component: 'system' });

const availability = new Map<string, boolean>();

export function isCommandInstalled(command: string): boolean {
  const cached = availability.get(command);
  if (cached !== undefined) {
    return cached;
  }

  let available: boolean;
  try {
    execFileSync('which', [command], { stdio: 'ignore' });
    available = true;
    log.debug({ command }, 'Command is available');
  } catch {
    available = false;
    log.error({ command }, 'Command is not installed');
  }

  availability.set(command, available);
  return available;
}

export function assertCommandsInstalled(commands: string[]): void {
  for (const command of commands) {
    if (!isCommandInstalled(command)) {
      throw new VpnBinaryNotInstalledError(command);
    }
  }
}

export function getOpenVpnVersion(binary: string): string | null {
  try {
    // openvpn --version exits with status 1 after printing
    const output = execFileSync(binary, ['--version'], { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'ignore'] });
    return output.split('\n')[0]?.trim() || null;
  } catch (err) {
    if (err instanceof Error && 'stdout' in err && typeof err.stdout === 'string' && err.stdout.trim()) {
      return err.stdout.split('\n')[0]?.trim() || null;
    }
    return null;
  }
}
