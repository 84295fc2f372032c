import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { StoreWriteError } from './errors.js';
import { initBrokerSchema, initTaskSchema } from './schema.js';

export type SqliteDb = Database.Database;

function openSqlite(dbPath: string): SqliteDb {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');
  return db;
}

export function openTaskDb(dbPath: string): SqliteDb {
  const db = openSqlite(dbPath);
  initTaskSchema(db);
  return db;
}

export function openBrokerDb(dbPath: string): SqliteDb {
  const db = openSqlite(dbPath);
  initBrokerSchema(db);
  return db;
}

/**
 * Runs a single write and rethrows any driver failure as a StoreWriteError
 * naming the operation.
 */
export function guardWrite<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw new StoreWriteError(operation, { cause: error });
  }
}
