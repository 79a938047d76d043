/**
 * Migration runner for SQLite.
 * Tracks applied migrations in _migrations table.
 * Migrations are embedded as strings so the app ships as a single build.
 */

import type Database from "better-sqlite3";

const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: "001_accounts.sql",
    sql: /* sql */ `
-- Users
CREATE TABLE IF NOT EXISTS auth_user (
  id TEXT PRIMARY KEY,
  username TEXT NOT NULL UNIQUE,
  email TEXT NOT NULL DEFAULT '',
  first_name TEXT NOT NULL DEFAULT '',
  last_name TEXT NOT NULL DEFAULT '',
  password_hash TEXT NOT NULL DEFAULT '',
  is_active INTEGER NOT NULL DEFAULT 1 CHECK (is_active IN (0,1)),
  is_staff INTEGER NOT NULL DEFAULT 0 CHECK (is_staff IN (0,1)),
  is_superuser INTEGER NOT NULL DEFAULT 0 CHECK (is_superuser IN (0,1)),
  date_joined TEXT NOT NULL,
  last_login TEXT
);

-- User profiles (one per user)
CREATE TABLE IF NOT EXISTS user_profile (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL UNIQUE REFERENCES auth_user(id) ON DELETE CASCADE,
  home_address TEXT,
  phone_number TEXT CHECK (phone_number IS NULL OR length(phone_number) <= 20),
  longitude REAL CHECK (longitude IS NULL OR (longitude >= -180 AND longitude <= 180)),
  latitude REAL CHECK (latitude IS NULL OR (latitude >= -90 AND latitude <= 90)),
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  CHECK ((longitude IS NULL) = (latitude IS NULL))
);
CREATE INDEX IF NOT EXISTS idx_user_profile_created_at ON user_profile(created_at);
CREATE INDEX IF NOT EXISTS idx_user_profile_updated_at ON user_profile(updated_at);

-- Authentication audit trail
CREATE TABLE IF NOT EXISTS user_activity_log (
  id TEXT PRIMARY KEY,
  user_id TEXT REFERENCES auth_user(id) ON DELETE SET NULL,
  username TEXT NOT NULL,
  action TEXT NOT NULL CHECK (action IN ('login','logout','failed_login')),
  ip_address TEXT,
  user_agent TEXT NOT NULL DEFAULT '',
  session_key TEXT,
  timestamp TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_user_activity_log_timestamp ON user_activity_log(timestamp DESC);
CREATE INDEX IF NOT EXISTS idx_user_activity_log_username ON user_activity_log(username);

-- Groups and permissions
CREATE TABLE IF NOT EXISTS auth_group (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL UNIQUE
);
CREATE TABLE IF NOT EXISTS auth_group_permission (
  group_id TEXT NOT NULL REFERENCES auth_group(id) ON DELETE CASCADE,
  codename TEXT NOT NULL,
  PRIMARY KEY (group_id, codename)
);
CREATE TABLE IF NOT EXISTS auth_user_group (
  user_id TEXT NOT NULL REFERENCES auth_user(id) ON DELETE CASCADE,
  group_id TEXT NOT NULL REFERENCES auth_group(id) ON DELETE CASCADE,
  PRIMARY KEY (user_id, group_id)
);
`,
  },
  {
    name: "002_sessions.sql",
    sql: /* sql */ `
CREATE TABLE IF NOT EXISTS session (
  session_key TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES auth_user(id) ON DELETE CASCADE,
  created_at TEXT NOT NULL,
  expires_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_session_expires_at ON session(expires_at);
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
