import Database from "better-sqlite3";
import type { Database as DatabaseType } from "better-sqlite3";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sessions (
  session_id      TEXT PRIMARY KEY,
  created_at      TEXT NOT NULL,
  current_content TEXT,
  current_version INTEGER NOT NULL DEFAULT 0,
  updated_at      TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS versions (
  version_id     TEXT PRIMARY KEY,
  document_id    TEXT NOT NULL REFERENCES sessions (session_id) ON DELETE CASCADE,
  version_number INTEGER NOT NULL CHECK (version_number >= 1),
  version_type   TEXT NOT NULL,
  content        TEXT NOT NULL,
  created_at     TEXT NOT NULL,
  UNIQUE (document_id, version_number)
);

CREATE TRIGGER IF NOT EXISTS versions_no_update
BEFORE UPDATE ON versions
BEGIN
  SELECT RAISE(ABORT, 'versions are append-only');
END;

CREATE TABLE IF NOT EXISTS privacy_tags (
  tag_id       TEXT PRIMARY KEY,
  session_id   TEXT NOT NULL REFERENCES sessions (session_id) ON DELETE CASCADE,
  start_offset INTEGER NOT NULL,
  end_offset   INTEGER NOT NULL,
  status       TEXT NOT NULL DEFAULT 'unreviewed' CHECK (status IN ('unreviewed', 'accepted', 'dismissed')),
  tag_type     TEXT NOT NULL,
  created_at   TEXT NOT NULL,
  CHECK (start_offset >= 0 AND start_offset < end_offset)
);

CREATE INDEX IF NOT EXISTS idx_tags_session ON privacy_tags (session_id, status);

CREATE TABLE IF NOT EXISTS privacy_levels (
  entity_kind TEXT NOT NULL CHECK (entity_kind IN ('session', 'card')),
  entity_id   TEXT NOT NULL,
  level       TEXT NOT NULL CHECK (level IN ('private', 'public')),
  updated_at  TEXT NOT NULL,
  PRIMARY KEY (entity_kind, entity_id)
);

CREATE INDEX IF NOT EXISTS idx_levels_level ON privacy_levels (entity_kind, level);

CREATE TABLE IF NOT EXISTS vault (
  id            INTEGER PRIMARY KEY CHECK (id = 1),
  password_hash TEXT NOT NULL,
  updated_at    TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS cards (
  card_id    TEXT PRIMARY KEY,
  session_id TEXT NOT NULL REFERENCES sessions (session_id) ON DELETE CASCADE,
  content    TEXT NOT NULL,
  pile       TEXT NOT NULL CHECK (pile IN ('INBOX', 'VAULT')),
  tag_type   TEXT NOT NULL,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_cards_session ON cards (session_id);

CREATE TABLE IF NOT EXISTS events (
  event_id   INTEGER PRIMARY KEY AUTOINCREMENT,
  event_type TEXT NOT NULL,
  timestamp  TEXT NOT NULL,
  payload    TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_events_type ON events (event_type);
CREATE INDEX IF NOT EXISTS idx_events_ts   ON events (timestamp);
`;

export class DatabaseManager {
  private db: DatabaseType | null = null;

  get connection(): DatabaseType {
    if (!this.db) {
      throw new Error("Database not opened. Call open() first.");
    }
    return this.db;
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  open(path: string): void {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("busy_timeout = 5000");
  }

  initialize(): void {
    const db = this.connection;
    db.exec(SCHEMA_SQL);

    const now = new Date().toISOString();
    db.prepare(
      `INSERT INTO events (event_type, timestamp, payload) VALUES (?, ?, ?)`,
    ).run("DB_INITIALIZED", now, JSON.stringify({ initialized_at: now }));
  }

  isInitialized(): boolean {
    if (!this.db) return false;
    try {
      const row = this.db
        .prepare(`SELECT name FROM sqlite_master WHERE type='table' AND name='events'`)
        .get() as { name: string } | undefined;
      return row !== undefined;
    } catch {
      return false;
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
