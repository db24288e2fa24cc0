/**
 * SQLite Storage Layer
 *
 * Durable home of the four learning collections: cycles, skills, memory and
 * goals (plus consciousness history and the follow-up query queue). Uses better-sqlite3 for synchronous
 * SQLite operations; every store shares this one connection.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { PersistenceError } from '../core/errors.js';
import type { StorageConfig } from '../core/types.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS learning_cycles (
    cycle_id INTEGER PRIMARY KEY,
    phase TEXT NOT NULL,
    started_at TEXT NOT NULL,
    ended_at TEXT,
    outcome TEXT,
    focus TEXT,
    topics TEXT NOT NULL DEFAULT '[]',
    phase_reports TEXT NOT NULL DEFAULT '[]',
    stats TEXT
  );

  CREATE TABLE IF NOT EXISTS skills (
    name TEXT PRIMARY KEY,
    score REAL NOT NULL,
    ceiling REAL NOT NULL,
    trend REAL NOT NULL DEFAULT 0,
    last_updated TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS memory_entries (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    source TEXT NOT NULL,
    content TEXT NOT NULL,
    importance REAL NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_memory_created ON memory_entries(created_at, seq);
  CREATE INDEX IF NOT EXISTS idx_memory_source ON memory_entries(source);

  CREATE TABLE IF NOT EXISTS memory_associations (
    entry_id TEXT NOT NULL,
    skill TEXT NOT NULL,
    PRIMARY KEY (entry_id, skill),
    FOREIGN KEY (entry_id) REFERENCES memory_entries(id)
  );

  CREATE INDEX IF NOT EXISTS idx_associations_skill ON memory_associations(skill);

  CREATE TABLE IF NOT EXISTS goals (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    description TEXT NOT NULL,
    target_skill TEXT NOT NULL,
    priority REAL NOT NULL,
    status TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    resolved_at TEXT
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_goals_one_active
    ON goals(target_skill) WHERE status = 'active';
  CREATE INDEX IF NOT EXISTS idx_goals_status ON goals(status);

  CREATE TABLE IF NOT EXISTS consciousness_history (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp TEXT NOT NULL,
    level REAL NOT NULL
  );

  CREATE TABLE IF NOT EXISTS follow_up_queries (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    skill TEXT NOT NULL,
    query TEXT NOT NULL,
    created_at TEXT NOT NULL,
    UNIQUE (skill, query)
  );

  CREATE INDEX IF NOT EXISTS idx_follow_up_skill ON follow_up_queries(skill, seq);
`;

export class SQLiteStorage {
  private db: Database.Database;

  constructor(config: StorageConfig) {
    if (config.sqlitePath !== ':memory:') {
      mkdirSync(dirname(config.sqlitePath), { recursive: true });
    }
    this.db = new Database(config.sqlitePath);

    if (config.enableWAL) {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.pragma('foreign_keys = ON');
    this.initializeSchema();
  }

  private initializeSchema(): void {
    this.db.exec(SCHEMA);
  }

  /**
   * Run `fn` inside a single transaction. Any failure rolls the whole unit
   * back and surfaces as a PersistenceError. Nested calls become savepoints
   * of the outer transaction.
   */
  transaction<T>(operation: string, fn: () => T): T {
    const run = this.db.transaction(fn);
    try {
      return run();
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      if (error instanceof Database.SqliteError) {
        throw new PersistenceError(operation, error);
      }
      throw error;
    }
  }

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }
}
