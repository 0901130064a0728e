import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { StoreUnavailableError } from './errors.js';

export type Db = Database.Database;

// Opens (creating if needed) and migrates the database. ':memory:' is accepted for tests.
export function openDatabase(dbPath: string): Db {
  try {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const db = new Database(dbPath);
    migrate(db);
    return db;
  } catch (err) {
    throw new StoreUnavailableError(dbPath, err);
  }
}

export function migrate(db: Db) {
  db.pragma('journal_mode = WAL');
  db.exec(`
    CREATE TABLE IF NOT EXISTS guild_settings (
      guild_id TEXT PRIMARY KEY,
      channel_id TEXT,
      lead_minutes INTEGER,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS guild_subscriptions (
      guild_id TEXT NOT NULL,
      kind TEXT NOT NULL CHECK (kind IN ('team', 'event_group')),
      value TEXT NOT NULL,
      value_key TEXT NOT NULL,
      PRIMARY KEY (guild_id, kind, value_key)
    );

    CREATE TABLE IF NOT EXISTS events (
      external_id TEXT PRIMARY KEY,
      kind TEXT NOT NULL CHECK (kind IN ('match', 'result')),
      team_a TEXT NOT NULL,
      team_b TEXT NOT NULL,
      flag_a TEXT NOT NULL DEFAULT '',
      flag_b TEXT NOT NULL DEFAULT '',
      score_a INTEGER,
      score_b INTEGER,
      winner INTEGER,
      event_group TEXT NOT NULL,
      series TEXT,
      status TEXT NOT NULL,
      url TEXT NOT NULL,
      scheduled_at TEXT,
      notified INTEGER NOT NULL DEFAULT 0,
      notified_late INTEGER NOT NULL DEFAULT 0,
      notified_at TEXT,
      result_announced INTEGER NOT NULL DEFAULT 0,
      first_seen_at TEXT NOT NULL,
      last_seen_at TEXT NOT NULL,
      content_hash TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS events_pending ON events (kind, notified, scheduled_at);

    CREATE TABLE IF NOT EXISTS notifications_log (
      guild_id TEXT NOT NULL,
      external_id TEXT NOT NULL,
      type TEXT NOT NULL CHECK (type IN ('match', 'result')),
      status TEXT NOT NULL CHECK (status IN ('pending', 'sent', 'failed')),
      detail TEXT,
      posted_at TEXT DEFAULT (datetime('now')),
      PRIMARY KEY (guild_id, external_id, type)
    );

    CREATE TABLE IF NOT EXISTS sync_state (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);
}
