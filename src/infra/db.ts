import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { BoardroomConfig } from '../core/config.js';

export type BoardroomDb = Database.Database;

export function openDb(cfg: BoardroomConfig): BoardroomDb {
  const dbPath = cfg.BOARDROOM_DB_PATH;
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  migrate(db);
  return db;
}

export function migrate(db: BoardroomDb): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      email TEXT NOT NULL UNIQUE,
      created_at INTEGER NOT NULL
    );

    -- phase, fact, rules and the verdict tallies belong to case voting
    CREATE TABLE IF NOT EXISTS boards (
      id TEXT PRIMARY KEY,
      description TEXT NOT NULL,
      fact TEXT NOT NULL,
      phase INTEGER NOT NULL,
      rules TEXT NOT NULL,
      verdict_falsy INTEGER NOT NULL,
      verdict_truthy INTEGER NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS board_members (
      id TEXT PRIMARY KEY,
      role INTEGER NOT NULL CHECK (role IN (0, 1, 2, 3)),  -- 0 = judge
      user_id TEXT,
      board_id TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      FOREIGN KEY(user_id) REFERENCES users(id) ON DELETE CASCADE,
      FOREIGN KEY(board_id) REFERENCES boards(id) ON DELETE CASCADE,
      UNIQUE(board_id, user_id)
    );

    -- Pending requests only: approval and withdrawal both delete the row
    CREATE TABLE IF NOT EXISTS join_requests (
      id TEXT PRIMARY KEY,
      motivation TEXT NOT NULL,
      preferred_role INTEGER NOT NULL CHECK (preferred_role IN (0, 1, 2, 3)),
      user_id TEXT,
      board_id TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      FOREIGN KEY(user_id) REFERENCES users(id) ON DELETE CASCADE,
      FOREIGN KEY(board_id) REFERENCES boards(id) ON DELETE CASCADE,
      UNIQUE(board_id, user_id)
    );

    -- One judge per board
    CREATE UNIQUE INDEX IF NOT EXISTS idx_board_members_judge ON board_members(board_id) WHERE role = 0;

    CREATE INDEX IF NOT EXISTS idx_board_members_user_id ON board_members(user_id);
    CREATE INDEX IF NOT EXISTS idx_join_requests_user_id ON join_requests(user_id);
    CREATE INDEX IF NOT EXISTS idx_join_requests_created_at ON join_requests(board_id, created_at);
  `);
}
