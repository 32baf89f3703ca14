/**
 * SQLite wrapper
 * Thin helpers over better-sqlite3 so stores share one way of opening,
 * querying and closing a database
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

export type SQLiteDatabase = Database.Database;
export type SQLiteParam = string | number | bigint | null;

export interface SQLiteOptions {
  readonly?: boolean;
  walMode?: boolean;
}

export const IN_MEMORY = ':memory:';

/**
 * Open a database file (or an in-memory database), creating the parent
 * directory when needed. Foreign keys are always enforced.
 */
export function createSQLiteDatabase(dbPath: string, options?: SQLiteOptions): SQLiteDatabase {
  const readonly = options?.readonly ?? false;

  if (dbPath !== IN_MEMORY && !readonly) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath, { readonly });
  db.pragma('foreign_keys = ON');

  if (options?.walMode && dbPath !== IN_MEMORY && !readonly) {
    db.pragma('journal_mode = WAL');
  }

  return db;
}

export function sqliteExec(db: SQLiteDatabase, sql: string): void {
  db.exec(sql);
}

export function sqliteRun(db: SQLiteDatabase, sql: string, params: SQLiteParam[] = []): Database.RunResult {
  return db.prepare(sql).run(...params);
}

export function sqliteGet<T>(db: SQLiteDatabase, sql: string, params: SQLiteParam[] = []): T | undefined {
  return db.prepare<SQLiteParam[], T>(sql).get(...params);
}

export function sqliteAll<T>(db: SQLiteDatabase, sql: string, params: SQLiteParam[] = []): T[] {
  return db.prepare<SQLiteParam[], T>(sql).all(...params);
}

export function sqliteClose(db: SQLiteDatabase): void {
  if (db.open) {
    db.close();
  }
}

/** SQLite has no boolean type; flags are stored as 0/1. */
export function toSQLiteBool(value: boolean): number {
  return value ? 1 : 0;
}

export function toDateFromSQLite(value: unknown): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'number') return new Date(value);
  if (typeof value === 'string') {
    // datetime('now') yields "YYYY-MM-DD HH:MM:SS" in UTC without a zone marker
    const normalized = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/.test(value)
      ? `${value.replace(' ', 'T')}Z`
      : value;
    return new Date(normalized);
  }
  return new Date(NaN);
}

/** Convert the lastInsertRowid of a run result into a plain number id. */
export function insertedId(result: Database.RunResult): number {
  return Number(result.lastInsertRowid);
}
