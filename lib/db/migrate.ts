/**
 * Migration runner for SQLite.
 * Tracks applied migrations in _migrations table.
 * Migrations are embedded as strings so the server needs no SQL files at runtime.
 */

import type Database from "better-sqlite3";

const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: "001_schema.sql",
    sql: /* sql */ `
-- Users
CREATE TABLE IF NOT EXISTS user_account (
  id TEXT PRIMARY KEY,
  email TEXT NOT NULL,
  password_hash TEXT NOT NULL,
  name TEXT NOT NULL,
  location TEXT,
  availability TEXT,
  skills_offered TEXT NOT NULL DEFAULT '[]',
  skills_wanted TEXT NOT NULL DEFAULT '[]',
  is_public INTEGER NOT NULL DEFAULT 1 CHECK (is_public IN (0, 1)),
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_user_account_email ON user_account(email);
CREATE INDEX IF NOT EXISTS idx_user_account_public ON user_account(is_public, created_at);

-- Swap requests
CREATE TABLE IF NOT EXISTS swap_request (
  id TEXT PRIMARY KEY,
  requester_id TEXT NOT NULL REFERENCES user_account(id) ON DELETE CASCADE,
  recipient_id TEXT NOT NULL REFERENCES user_account(id) ON DELETE CASCADE,
  offered_skill TEXT NOT NULL,
  wanted_skill TEXT NOT NULL,
  message TEXT,
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending','accepted','rejected','cancelled')),
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  CHECK (requester_id <> recipient_id)
);
CREATE INDEX IF NOT EXISTS idx_swap_request_requester_status ON swap_request(requester_id, status);
CREATE INDEX IF NOT EXISTS idx_swap_request_recipient_status ON swap_request(recipient_id, status);
`,
  },
  {
    name: "002_reply_and_photo.sql",
    sql: /* sql */ `
ALTER TABLE swap_request ADD COLUMN acceptance_message TEXT;
ALTER TABLE user_account ADD COLUMN profile_photo TEXT;
`,
  },
];

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  for (const migration of MIGRATIONS) {
    const row = db
      .prepare("SELECT 1 FROM _migrations WHERE name = ?")
      .get(migration.name);
    if (row) continue;

    db.exec(migration.sql);
    db.prepare("INSERT INTO _migrations (name) VALUES (?)").run(migration.name);
  }
}
