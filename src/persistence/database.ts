import Database, { type Database as DatabaseType } from "better-sqlite3";
import { PersistenceError } from "./errors.js";

export type SqliteDatabase = DatabaseType;

/**
 * Stores take either a path (":memory:" for tests) or an open handle,
 * so scratch, ledger and corpus can share one file.
 */
export type DatabaseSource = { dbPath: string } | { db: SqliteDatabase };

export function openDatabase(dbPath: string): SqliteDatabase {
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 3000");
  return db;
}

export function resolveDatabase(source: DatabaseSource): {
  db: SqliteDatabase;
  owned: boolean;
} {
  if ("db" in source) return { db: source.db, owned: false };
  return { db: openDatabase(source.dbPath), owned: true };
}

/**
 * Run a synchronous SQLite operation, rethrowing driver errors as
 * PersistenceError so callers see one error type per store.
 */
export function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof PersistenceError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new PersistenceError("STORE_FAILURE", `${operation}: ${reason}`, {
      cause: err,
    });
  }
}
