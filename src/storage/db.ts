/**
 * Database layer using better-sqlite3
 *
 * One shared connection per process. better-sqlite3 is synchronous, so the
 * repositories wrap each statement in an async method; the busy timeout
 * bounds how long a statement waits on a locked database.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { createLogger } from "../logging";

const log = createLogger("db");

export type SqliteDatabase = Database.Database;

export interface DatabaseOptions {
  /** Milliseconds a statement waits on a lock before failing */
  busyTimeoutMs?: number;
}

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    username TEXT NOT NULL UNIQUE,
    email TEXT NOT NULL UNIQUE,
    password_hash TEXT NOT NULL,
    full_name TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    is_admin INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,

  `CREATE TABLE IF NOT EXISTS api_keys (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    description TEXT,
    key_prefix TEXT NOT NULL,
    lookup_hash TEXT NOT NULL,
    secret_hash TEXT NOT NULL,
    salt TEXT NOT NULL,
    scopes TEXT NOT NULL,
    expires_at TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    last_used_at TEXT,
    usage_count INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_api_keys_lookup_hash ON api_keys(lookup_hash)`,
  `CREATE INDEX IF NOT EXISTS idx_api_keys_user ON api_keys(user_id)`,

  `CREATE TABLE IF NOT EXISTS groups (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    description TEXT,
    created_by TEXT REFERENCES users(id) ON DELETE SET NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,

  `CREATE TABLE IF NOT EXISTS group_memberships (
    group_id TEXT NOT NULL REFERENCES groups(id) ON DELETE CASCADE,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    role TEXT NOT NULL CHECK (role IN ('owner', 'admin', 'member')),
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    PRIMARY KEY (group_id, user_id)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_group_memberships_user ON group_memberships(user_id)`,

  // A board hangs off a user or a group, never both; deleting the group
  // leaves it orphaned (both NULL)
  `CREATE TABLE IF NOT EXISTS boards (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    description TEXT,
    owner_id TEXT REFERENCES users(id) ON DELETE SET NULL,
    group_id TEXT REFERENCES groups(id) ON DELETE SET NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    CHECK (owner_id IS NULL OR group_id IS NULL)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_boards_owner ON boards(owner_id)`,
  `CREATE INDEX IF NOT EXISTS idx_boards_group ON boards(group_id)`,
];

/**
 * Open (and migrate) the credential store
 *
 * @param path - File path, or ":memory:" for an ephemeral database
 */
export function openDatabase(path: string, options: DatabaseOptions = {}): SqliteDatabase {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path, { timeout: options.busyTimeoutMs ?? 5000 });

  // WAL lets readers proceed while a writer holds the lock
  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
  }
  db.pragma("foreign_keys = ON");

  db.transaction(() => {
    for (const statement of SCHEMA) {
      db.exec(statement);
    }
  })();

  log.debug("Database ready", { path });
  return db;
}

/**
 * Current time as the ISO-8601 string stored in every timestamp column
 */
export function timestamp(date: Date = new Date()): string {
  return date.toISOString();
}
