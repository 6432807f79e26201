import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger';

export const IN_MEMORY = ':memory:';

const MIGRATIONS = [
  // Migration 000: Core tables
  `
  CREATE TABLE IF NOT EXISTS elections (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    blockchain_id INTEGER NOT NULL UNIQUE,
    name TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    phase TEXT NOT NULL DEFAULT 'CREATED',
    is_live_results INTEGER NOT NULL DEFAULT 1,
    expires_at TEXT,
    started_at TEXT,
    ended_at TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS voters (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    enrollment TEXT NOT NULL UNIQUE,
    name TEXT NOT NULL,
    template BLOB NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS voter_election_registrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    voter_id INTEGER NOT NULL REFERENCES voters(id),
    election_id INTEGER NOT NULL,
    enrollment TEXT NOT NULL,
    enrollment_hash TEXT NOT NULL,
    face_hash TEXT NOT NULL,
    has_voted INTEGER NOT NULL DEFAULT 0,
    tx_hash TEXT NOT NULL,
    created_at TEXT NOT NULL,
    UNIQUE(voter_id, election_id)
  );

  CREATE TABLE IF NOT EXISTS vote_receipts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    receipt_id INTEGER NOT NULL UNIQUE,
    election_id INTEGER NOT NULL,
    enrollment_hash TEXT NOT NULL,
    visible_tag TEXT NOT NULL,
    tx_hash TEXT NOT NULL,
    block_number INTEGER NOT NULL,
    issued_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_receipts_hash_election ON vote_receipts(enrollment_hash, election_id);
  CREATE INDEX IF NOT EXISTS idx_registrations_election ON voter_election_registrations(election_id);
  `,
  // Migration 001: Receipts are write-once
  `
  CREATE TRIGGER IF NOT EXISTS vote_receipts_no_update
  BEFORE UPDATE ON vote_receipts
  BEGIN
    SELECT RAISE(ABORT, 'vote receipts are immutable');
  END;

  CREATE TRIGGER IF NOT EXISTS vote_receipts_no_delete
  BEFORE DELETE ON vote_receipts
  BEGIN
    SELECT RAISE(ABORT, 'vote receipts are immutable');
  END;
  `,
];

/**
 * Opens the cache database and applies pending migrations.
 * Pass {@link IN_MEMORY} for a throwaway store.
 */
export function openDatabase(dbPath: string = IN_MEMORY): Database.Database {
  if (dbPath !== IN_MEMORY) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const applied = new Set(
    db
      .prepare<[], { id: number }>('SELECT id FROM _migrations')
      .all()
      .map((r) => r.id)
  );

  MIGRATIONS.forEach((sql, i) => {
    if (!applied.has(i)) {
      logger.debug(`Running cache migration ${i}`);
      db.exec(sql);
      db.prepare('INSERT INTO _migrations (id) VALUES (?)').run(i);
    }
  });

  return db;
}

export function closeDatabase(db: Database.Database): void {
  if (db.open) {
    db.close();
  }
}
