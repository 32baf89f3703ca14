/**
 * Board Repository - named workspaces
 */

import type { Board } from '../types.js';
import {
  insertedId,
  sqliteAll,
  sqliteGet,
  sqliteRun,
  type SQLiteDatabase
} from '../sqlite-wrapper.js';

export class BoardRepo {
  constructor(private readonly db: SQLiteDatabase) {}

  list(): Board[] {
    return sqliteAll<Board>(this.db, `SELECT id, name FROM boards ORDER BY id`);
  }

  get(id: number): Board | null {
    return sqliteGet<Board>(this.db, `SELECT id, name FROM boards WHERE id = ?`, [id]) ?? null;
  }

  isNameTaken(name: string, excludeId?: number): boolean {
    return sqliteGet<{ id: number }>(
      this.db,
      `SELECT id FROM boards WHERE name = ? AND id != ?`,
      [name, excludeId ?? 0]
    ) !== undefined;
  }

  create(name: string): Board {
    const result = sqliteRun(this.db, `INSERT INTO boards (name) VALUES (?)`, [name]);
    return { id: insertedId(result), name };
  }

  rename(id: number, name: string): Board | null {
    const changes = sqliteRun(this.db, `UPDATE boards SET name = ? WHERE id = ?`, [name, id]).changes;
    return changes > 0 ? { id, name } : null;
  }

  delete(id: number): boolean {
    return sqliteRun(this.db, `DELETE FROM boards WHERE id = ?`, [id]).changes > 0;
  }
}
