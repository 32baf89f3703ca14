/**
 * SQLite-backed taskboard store
 * Owns the connection and the schema; repositories borrow the handle
 */

import {
  createSQLiteDatabase,
  sqliteClose,
  sqliteExec,
  type SQLiteDatabase,
  type SQLiteOptions
} from './sqlite-wrapper.js';

export class TaskboardStore {
  readonly db: SQLiteDatabase;
  private initialized = false;

  constructor(dbPath: string, options?: SQLiteOptions) {
    this.db = createSQLiteDatabase(dbPath, {
      readonly: options?.readonly ?? false,
      walMode: options?.walMode ?? true
    });
  }

  /**
   * Create the schema if it is missing. Safe to call repeatedly.
   */
  initialize(): void {
    if (this.initialized) return;

    sqliteExec(this.db, `
      -- Accounts
      CREATE TABLE IF NOT EXISTS users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        email TEXT NOT NULL UNIQUE,
        username TEXT NOT NULL UNIQUE,
        password_hash TEXT NOT NULL,
        first_name TEXT NOT NULL DEFAULT '',
        last_name TEXT NOT NULL DEFAULT '',
        is_staff INTEGER NOT NULL DEFAULT 0,
        is_superuser INTEGER NOT NULL DEFAULT 0,
        date_joined TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS profiles (
        user_id INTEGER PRIMARY KEY REFERENCES users(id) ON DELETE CASCADE,
        bio TEXT,
        location TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS auth_tokens (
        key TEXT PRIMARY KEY,
        user_id INTEGER NOT NULL UNIQUE REFERENCES users(id) ON DELETE CASCADE,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      -- People that tasks can be assigned to
      CREATE TABLE IF NOT EXISTS contacts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        email TEXT NOT NULL UNIQUE,
        phone TEXT NOT NULL,
        color TEXT NOT NULL DEFAULT '#000000'
      );

      CREATE TABLE IF NOT EXISTS boards (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE
      );

      CREATE TABLE IF NOT EXISTS tasks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL,
        description TEXT,
        due_date TEXT NOT NULL,
        priority TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'to-do',
        task_category TEXT,
        icon TEXT DEFAULT '/static/default.svg'
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);

      -- Many-to-many: assigned contacts
      CREATE TABLE IF NOT EXISTS task_contacts (
        task_id INTEGER NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
        contact_id INTEGER NOT NULL REFERENCES contacts(id) ON DELETE CASCADE,
        PRIMARY KEY (task_id, contact_id)
      );

      CREATE INDEX IF NOT EXISTS idx_task_contacts_contact ON task_contacts(contact_id);

      -- One-to-many: subtasks owned by a task
      CREATE TABLE IF NOT EXISTS subtasks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        task_id INTEGER NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
        title TEXT NOT NULL,
        completed INTEGER NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_subtasks_task ON subtasks(task_id);
    `);

    this.initialized = true;
  }

  /**
   * Run `fn` inside a single transaction; a thrown error rolls it back.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    sqliteClose(this.db);
  }
}
