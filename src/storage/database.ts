/**
 * Embedded Datastore
 *
 * Single-writer SQLite database through better-sqlite3. Statements and
 * transactions are synchronous, so a transaction is one atomic unit of work
 * that no other call can interleave with.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { PersistenceError } from '~/types';

export type Db = Database.Database;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  username_token TEXT NOT NULL UNIQUE,
  username_enc TEXT NOT NULL,
  password_hash TEXT NOT NULL,
  role TEXT NOT NULL CHECK (role IN ('administrator', 'operator')),
  first_name_enc TEXT NOT NULL,
  last_name_enc TEXT NOT NULL,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS vehicles (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  brand TEXT NOT NULL,
  model TEXT NOT NULL,
  serial_number TEXT NOT NULL UNIQUE,
  top_speed INTEGER NOT NULL,
  battery_capacity INTEGER NOT NULL,
  soc INTEGER NOT NULL,
  soc_min INTEGER NOT NULL,
  soc_max INTEGER NOT NULL,
  latitude REAL NOT NULL,
  longitude REAL NOT NULL,
  out_of_service INTEGER NOT NULL DEFAULT 0,
  mileage INTEGER NOT NULL DEFAULT 0,
  last_maintenance_date TEXT,
  in_service_date TEXT NOT NULL,
  CHECK (soc_min < soc_max AND soc BETWEEN soc_min AND soc_max AND soc_max <= 100)
);

CREATE TABLE IF NOT EXISTS travellers (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  first_name_enc TEXT NOT NULL,
  last_name_enc TEXT NOT NULL,
  birthday_enc TEXT NOT NULL,
  gender TEXT NOT NULL CHECK (gender IN ('male', 'female')),
  street_name_enc TEXT NOT NULL,
  house_number_enc TEXT NOT NULL,
  zip_code_enc TEXT NOT NULL,
  city TEXT NOT NULL,
  email_enc TEXT NOT NULL,
  mobile_phone_enc TEXT NOT NULL,
  license_token TEXT NOT NULL UNIQUE,
  license_enc TEXT NOT NULL,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS audit_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  date TEXT NOT NULL,
  time TEXT NOT NULL,
  occurred_at INTEGER NOT NULL,
  event_type TEXT NOT NULL,
  actor_token TEXT,
  actor_enc TEXT,
  description_enc TEXT NOT NULL,
  extra_info_enc TEXT NOT NULL,
  suspicious INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS audit_log_actor_event ON audit_log (actor_token, event_type, occurred_at);

CREATE TABLE IF NOT EXISTS restore_grants (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  code_token TEXT NOT NULL UNIQUE,
  admin_token TEXT NOT NULL,
  admin_enc TEXT NOT NULL,
  backup_ref TEXT NOT NULL,
  used INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  used_at TEXT
);
`;

/**
 * Open (and if needed create) the datastore.
 *
 * @param path - File path, or ':memory:' for a private in-process database
 */
export function openDatabase(path: string): Db {
  return guardSql('open database', () => {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }
    const db = new Database(path);
    if (path !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.exec(SCHEMA);
    return db;
  });
}

function isSqliteError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('SQLITE_')
  );
}

/**
 * Run datastore work, translating driver failures into PersistenceError
 */
export function guardSql<T>(operation: string, work: () => T): T {
  try {
    return work();
  } catch (error) {
    if (isSqliteError(error)) {
      throw new PersistenceError(`${operation} failed: ${error.code} ${error.message}`);
    }
    if (error instanceof TypeError && /database|connection/i.test(error.message)) {
      throw new PersistenceError(`${operation} failed: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Run work inside one transaction; any throw rolls everything back
 */
export function inTransaction<T>(db: Db, operation: string, work: () => T): T {
  return guardSql(operation, () => db.transaction(work)());
}

/**
 * Build "col = @key" assignments for the keys present in a change set.
 * Column names come only from the fixed mapping, never from input.
 */
export function assignments<K extends string>(
  columns: ReadonlyArray<readonly [K, string]>,
  changes: Partial<Record<K, unknown>>
): string[] {
  return columns
    .filter(([key]) => changes[key] !== undefined)
    .map(([key, column]) => `${column} = @${key}`);
}

/** SQLite has no boolean; store flags as 0/1 */
export function toFlag(value: boolean): number {
  return value ? 1 : 0;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local calendar date, YYYY-MM-DD */
export function localDate(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

/** Local wall-clock time, HH:MM:SS */
export function localTime(now: Date = new Date()): string {
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
}

export function nowTimestamp(now: Date = new Date()): string {
  return `${localDate(now)} ${localTime(now)}`;
}
