import type { SessionHistoryEntry } from '../storage/sqlite.js';
import type { SessionLogLine, SessionSnapshot } from '../session/types.js';

const NOT_AVAILABLE = 'N/A';

export function formatStatus(snapshot: SessionSnapshot): string {
  const connected = snapshot.state === 'connected';
  const server = connected ? snapshot.peer?.remoteAddress : undefined;
  const address = connected ? snapshot.peer?.localAddress : undefined;

  return [
    `Status: ${snapshot.token}`,
    `Server: ${server ?? NOT_AVAILABLE}`,
    `IP:     ${address ?? NOT_AVAILABLE}`,
  ].join('\n');
}

export function formatLogLine(line: SessionLogLine): string {
  if (line.level === 'info') {
    return line.text;
  }
  return `[${line.level}] ${line.text}`;
}

export function formatHistory(entries: SessionHistoryEntry[]): string {
  if (entries.length === 0) {
    return 'No sessions recorded yet.';
  }

  return entries
    .map(entry => {
      const ended = entry.endedAt ? `ended ${entry.endedAt} (${entry.endReason ?? 'unknown'})` : 'still open';
      const peer = entry.remoteAddress ? ` via ${entry.remoteAddress}` : '';
      return `${entry.startedAt}  ${entry.configPath}  ${entry.lastState}${peer}  ${ended}`;
    })
    .join('\n');
}
