import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { getLogger } from '../../utils/logger.js';

let db: Database.Database | undefined;

const MIGRATIONS = [
  // Migration 000: Core tables
  `
  CREATE TABLE IF NOT EXISTS congress_events (
    event_id TEXT PRIMARY KEY,
    congress INTEGER NOT NULL,
    chamber TEXT NOT NULL DEFAULT '',
    title TEXT NOT NULL DEFAULT '',
    date TEXT,
    event_type TEXT NOT NULL DEFAULT '',
    status TEXT NOT NULL DEFAULT '',
    committee_name TEXT NOT NULL DEFAULT '',
    committee_code TEXT NOT NULL DEFAULT '',
    committees TEXT NOT NULL DEFAULT '[]',
    fetched_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS videos (
    video_id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    url TEXT NOT NULL,
    date TEXT,
    date_source TEXT NOT NULL DEFAULT 'none',
    channel_id TEXT,
    channel_name TEXT,
    committee_id TEXT,
    livestream_confidence TEXT,
    first_seen TEXT NOT NULL DEFAULT (datetime('now')),
    last_seen TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE INDEX IF NOT EXISTS idx_events_date ON congress_events(date);
  CREATE INDEX IF NOT EXISTS idx_events_committee ON congress_events(committee_code);
  CREATE INDEX IF NOT EXISTS idx_videos_date ON videos(date);
  CREATE INDEX IF NOT EXISTS idx_videos_committee ON videos(committee_id);
  `,
  // Migration 001: Resumable fetch checkpoints
  `
  CREATE TABLE IF NOT EXISTS fetch_progress (
    key TEXT PRIMARY KEY,
    state TEXT NOT NULL,
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
  `,
  // Migration 002: Match run history
  `
  CREATE TABLE IF NOT EXISTS match_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    committee_id TEXT,
    total_videos INTEGER NOT NULL,
    total_events INTEGER NOT NULL,
    matched INTEGER NOT NULL,
    algorithmic INTEGER NOT NULL,
    adjudicated INTEGER NOT NULL,
    threshold_high REAL NOT NULL,
    threshold_low REAL NOT NULL,
    report_path TEXT,
    cost_cents REAL NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
  `,
];

/** Apply pending migrations in order. Safe to call on an up-to-date database. */
export function migrate(database: Database.Database): void {
  const log = getLogger();

  database.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const applied = new Set<number>();
  for (const row of database.prepare('SELECT id FROM _migrations').all()) {
    if (typeof row === 'object' && row !== null && 'id' in row && typeof row.id === 'number') {
      applied.add(row.id);
    }
  }

  const record = database.prepare('INSERT INTO _migrations (id) VALUES (?)');
  MIGRATIONS.forEach((sql, i) => {
    if (applied.has(i)) return;
    log.info(`Running migration ${i}`);
    database.transaction(() => {
      database.exec(sql);
      record.run(i);
    })();
  });
}

export function getDb(dbPath: string): Database.Database {
  if (db) return db;

  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  migrate(db);
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}
