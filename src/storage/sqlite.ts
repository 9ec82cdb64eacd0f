import Database from 'better-sqlite3';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { StorageError } from '../utils/errors.js';
import type {
  SessionEndReason,
  SessionLogLine,
  SessionRecorder,
  SessionSnapshot,
} from '../session/types.js';
import fs from 'fs';
import path from 'path';

const log = logger.child({ component: 'sqlite' });

let db: Database.Database | null = null;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS sessions (
    id TEXT PRIMARY KEY,
    config_path TEXT NOT NULL,
    started_at TEXT NOT NULL,
    ended_at TEXT,
    end_reason TEXT,
    last_state TEXT NOT NULL,
    local_address TEXT,
    remote_address TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_sessions_started_at ON sessions(started_at);

  CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT NOT NULL,
    kind TEXT NOT NULL,
    content TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    FOREIGN KEY (session_id) REFERENCES sessions(id)
  );

  CREATE INDEX IF NOT EXISTS idx_events_session_id ON events(session_id);
`;

export function openDatabase(filePath: string): Database.Database {
  if (filePath !== ':memory:') {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const database = new Database(filePath);
  database.pragma('journal_mode = WAL');
  database.exec(SCHEMA);
  return database;
}

export function getDatabase(): Database.Database {
  if (db) return db;

  db = openDatabase(config.journal.path);
  log.info({ path: config.journal.path }, 'SQLite database initialized');
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    log.info('SQLite connection closed');
  }
}

export interface SessionHistoryEntry {
  id: string;
  configPath: string;
  startedAt: string;
  endedAt: string | null;
  endReason: SessionEndReason | null;
  lastState: string;
  localAddress: string | null;
  remoteAddress: string | null;
}

export interface SessionEventEntry {
  sessionId: string;
  kind: string;
  content: string;
  timestamp: string;
}

interface SessionHistoryRow {
  id: string;
  configPath: string;
  startedAt: string;
  endedAt: string | null;
  endReason: string | null;
  lastState: string;
  localAddress: string | null;
  remoteAddress: string | null;
}

const END_REASONS: readonly SessionEndReason[] = ['stopped', 'process-exited', 'connection-lost', 'start-failed'];

function toEndReason(value: string | null): SessionEndReason | null {
  return END_REASONS.find(reason => reason === value) ?? null;
}

/**
 * Connection history, one row per session plus its state and log events.
 */
export class SessionJournal implements SessionRecorder {
  constructor(private database: Database.Database) {}

  sessionStarted(sessionId: string, configPath: string): void {
    try {
      const stmt = this.database.prepare(`
        INSERT INTO sessions (id, config_path, started_at, last_state)
        VALUES (?, ?, ?, 'DISCONNECTED')
      `);
      stmt.run(sessionId, configPath, new Date().toISOString());
      log.debug({ sessionId }, 'Session logged');
    } catch (err) {
      log.error({ err, sessionId }, 'Failed to log session start');
      throw new StorageError('sessionStarted', err instanceof Error ? err : undefined);
    }
  }

  stateChanged(sessionId: string, snapshot: SessionSnapshot): void {
    try {
      const stmt = this.database.prepare(`
        UPDATE sessions
        SET last_state = ?,
            local_address = COALESCE(?, local_address),
            remote_address = COALESCE(?, remote_address)
        WHERE id = ?
      `);
      stmt.run(
        snapshot.token,
        snapshot.peer?.localAddress ?? null,
        snapshot.peer?.remoteAddress ?? null,
        sessionId
      );
    } catch (err) {
      log.error({ err, sessionId }, 'Failed to log state change');
    }
    this.logEvent(sessionId, 'state', snapshot.token);
  }

  logLine(sessionId: string, line: SessionLogLine): void {
    this.logEvent(sessionId, `log:${line.level}`, line.text);
  }

  sessionEnded(sessionId: string, reason: SessionEndReason): void {
    try {
      const stmt = this.database.prepare(`
        UPDATE sessions SET ended_at = ?, end_reason = ?
        WHERE id = ?
      `);
      stmt.run(new Date().toISOString(), reason, sessionId);
      log.debug({ sessionId, reason }, 'Session end logged');
    } catch (err) {
      log.error({ err, sessionId }, 'Failed to log session end');
      throw new StorageError('sessionEnded', err instanceof Error ? err : undefined);
    }
  }

  private logEvent(sessionId: string, kind: string, content: string): void {
    try {
      const stmt = this.database.prepare(`
        INSERT INTO events (session_id, kind, content, timestamp)
        VALUES (?, ?, ?, ?)
      `);
      stmt.run(sessionId, kind, content, new Date().toISOString());
    } catch (err) {
      // Event history is best effort
      log.error({ err, sessionId, kind }, 'Failed to log event');
    }
  }

  getRecentSessions(limit = 10): SessionHistoryEntry[] {
    const stmt = this.database.prepare<[number], SessionHistoryRow>(`
      SELECT id, config_path as configPath, started_at as startedAt, ended_at as endedAt,
             end_reason as endReason, last_state as lastState,
             local_address as localAddress, remote_address as remoteAddress
      FROM sessions
      ORDER BY started_at DESC, rowid DESC
      LIMIT ?
    `);
    return stmt.all(limit).map(row => ({ ...row, endReason: toEndReason(row.endReason) }));
  }

  getSessionEvents(sessionId: string, limit = 100): SessionEventEntry[] {
    const stmt = this.database.prepare<[string, number], SessionEventEntry>(`
      SELECT session_id as sessionId, kind, content, timestamp
      FROM events
      WHERE session_id = ?
      ORDER BY id ASC
      LIMIT ?
    `);
    return stmt.all(sessionId, limit);
  }
}
