import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import * as schema from './schema.js';
import { translateStoreError } from '../errors.js';
import path from 'path';
import fs from 'fs';

export type ProgressionDb = BetterSQLite3Database<typeof schema>;

/** Either the database handle or an open transaction on it. */
export type Executor = BaseSQLiteDatabase<'sync', Database.RunResult, typeof schema>;

export interface DatabaseHandle {
  sqlite: Database.Database;
  db: ProgressionDb;
}

export { schema };

const IN_MEMORY = ':memory:';

export function openDatabase(dbPath: string): DatabaseHandle {
  if (dbPath !== IN_MEMORY) {
    // Ensure data directory exists
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('synchronous = NORMAL');
  }
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  initializeDatabase(sqlite);
  return { sqlite, db: drizzle(sqlite, { schema }) };
}

/**
 * Runs `fn` inside a BEGIN IMMEDIATE transaction so the write lock is held
 * from the first read. Constraint failures surface as ledger errors.
 */
export function runInTransaction<T>(db: ProgressionDb, fn: (tx: Executor) => T): T {
  try {
    return db.transaction((tx) => fn(tx), { behavior: 'immediate' });
  } catch (err) {
    throw translateStoreError(err);
  }
}

// ─── Initialize tables ───
export function initializeDatabase(sqlite: Database.Database) {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS players (
      id TEXT PRIMARY KEY,
      first_login INTEGER,
      last_login INTEGER,
      points INTEGER NOT NULL DEFAULT 0,
      CONSTRAINT check_player_points_nonnegative CHECK (points >= 0),
      CONSTRAINT check_player_points_safe CHECK (points <= 9007199254740991)
    );

    CREATE TABLE IF NOT EXISTS boosts (
      id TEXT PRIMARY KEY,
      type TEXT NOT NULL UNIQUE CHECK (type IN ('DOUBLE_POINTS', 'SPEED', 'SHIELD')),
      description TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS player_boosts (
      player_id TEXT NOT NULL REFERENCES players(id) ON DELETE CASCADE,
      boost_id TEXT NOT NULL REFERENCES boosts(id) ON DELETE CASCADE,
      amount INTEGER NOT NULL DEFAULT 1,
      created_at INTEGER NOT NULL,
      PRIMARY KEY (player_id, boost_id),
      CONSTRAINT check_playerboost_amount_nonnegative CHECK (amount >= 0),
      CONSTRAINT check_playerboost_amount_safe CHECK (amount <= 9007199254740991)
    );
    CREATE INDEX IF NOT EXISTS ix_playerboost_player ON player_boosts(player_id);
    CREATE INDEX IF NOT EXISTS ix_playerboost_boost ON player_boosts(boost_id);

    CREATE TABLE IF NOT EXISTS levels (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL CHECK (length(title) <= 100),
      "order" INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS prizes (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL CHECK (length(title) <= 100)
    );

    CREATE TABLE IF NOT EXISTS level_prizes (
      level_id TEXT NOT NULL REFERENCES levels(id) ON DELETE CASCADE,
      prize_id TEXT NOT NULL REFERENCES prizes(id) ON DELETE CASCADE,
      PRIMARY KEY (level_id, prize_id)
    );
    CREATE INDEX IF NOT EXISTS ix_levelprize_level ON level_prizes(level_id);
    CREATE INDEX IF NOT EXISTS ix_levelprize_prize ON level_prizes(prize_id);

    CREATE TABLE IF NOT EXISTS player_levels (
      player_id TEXT NOT NULL REFERENCES players(id) ON DELETE CASCADE,
      level_id TEXT NOT NULL REFERENCES levels(id) ON DELETE CASCADE,
      completed INTEGER,
      score INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (player_id, level_id),
      CONSTRAINT check_playerlevel_score_nonnegative CHECK (score >= 0),
      CONSTRAINT check_playerlevel_score_safe CHECK (score <= 9007199254740991)
    );
    CREATE INDEX IF NOT EXISTS ix_playerlevel_player ON player_levels(player_id);
    CREATE INDEX IF NOT EXISTS ix_playerlevel_level ON player_levels(level_id);
    CREATE INDEX IF NOT EXISTS ix_playerlevel_completed ON player_levels(completed);

    CREATE TABLE IF NOT EXISTS player_prizes (
      player_id TEXT NOT NULL REFERENCES players(id) ON DELETE CASCADE,
      prize_id TEXT NOT NULL REFERENCES prizes(id) ON DELETE CASCADE,
      received_at INTEGER NOT NULL,
      PRIMARY KEY (player_id, prize_id)
    );
    CREATE INDEX IF NOT EXISTS ix_playerprize_player ON player_prizes(player_id);
    CREATE INDEX IF NOT EXISTS ix_playerprize_prize ON player_prizes(prize_id);
  `);
}
