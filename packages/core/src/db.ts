import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';

export type PledgeDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

/** Returns the platform-appropriate default database path ($PLEDGE_DB wins) */
export function getDefaultDbPath(): string {
  const override = process.env['PLEDGE_DB'];
  if (override) return override;

  const platform = process.platform;
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', 'pledge');
  } else if (platform === 'win32') {
    dir = join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'pledge');
  } else {
    // Linux / other
    dir = join(process.env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), 'pledge');
  }

  return join(dir, 'pledge.db');
}

/**
 * The raw SQL to create the schema from scratch.
 * The three record tables share the address key space but carry no foreign
 * keys: deleting an objective leaves its priority and deadline rows behind.
 */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS objectives (
    address TEXT PRIMARY KEY,
    description TEXT NOT NULL,
    completed INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS priorities (
    address TEXT PRIMARY KEY,
    urgency INTEGER NOT NULL,
    CONSTRAINT urgency_range CHECK (urgency BETWEEN 1 AND 3)
);

CREATE TABLE IF NOT EXISTS deadlines (
    address TEXT PRIMARY KEY,
    target_point INTEGER NOT NULL,
    alert_activated INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS config (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);
`;

/**
 * Create a Drizzle database connection with proper pragmas.
 * If no path is given, uses the platform default.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path?: string): PledgeDb {
  const dbPath = path ?? getDefaultDbPath();

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Set pragmas — must happen on every connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');

  // Idempotent — all statements use IF NOT EXISTS
  sqlite.exec(CREATE_SCHEMA_SQL);

  return drizzle(sqlite, { schema });
}

/** Create an in-memory database with schema applied. For tests. */
export function createTestDb(): PledgeDb {
  return createDb(':memory:');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (transactions, pragmas).
 */
export function getRawDb(db: PledgeDb): Database.Database {
  return db.$client;
}

/** Get the file path of the database ('' for in-memory) */
export function getDbPath(db: PledgeDb): string {
  const list = getRawDb(db).pragma('database_list') as Array<{ file: string }>;
  return list[0]?.file ?? '';
}
