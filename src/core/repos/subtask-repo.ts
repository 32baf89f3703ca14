/**
 * Subtask Repository - subtasks are owned by exactly one task
 */

import type { Subtask } from '../types.js';
import {
  insertedId,
  sqliteAll,
  sqliteGet,
  sqliteRun,
  toSQLiteBool,
  type SQLiteDatabase
} from '../sqlite-wrapper.js';

interface SubtaskRow {
  id: number;
  task_id: number;
  title: string;
  completed: number;
}

export interface SubtaskFields {
  title: string;
  completed: boolean;
}

export class SubtaskRepo {
  constructor(private readonly db: SQLiteDatabase) {}

  list(): Subtask[] {
    return sqliteAll<SubtaskRow>(this.db, `SELECT * FROM subtasks ORDER BY id`).map(toSubtask);
  }

  listForTask(taskId: number): Subtask[] {
    return sqliteAll<SubtaskRow>(
      this.db,
      `SELECT * FROM subtasks WHERE task_id = ? ORDER BY id`,
      [taskId]
    ).map(toSubtask);
  }

  get(id: number): Subtask | null {
    const row = sqliteGet<SubtaskRow>(this.db, `SELECT * FROM subtasks WHERE id = ?`, [id]);
    return row ? toSubtask(row) : null;
  }

  create(taskId: number, fields: SubtaskFields): Subtask {
    const result = sqliteRun(
      this.db,
      `INSERT INTO subtasks (task_id, title, completed) VALUES (?, ?, ?)`,
      [taskId, fields.title, toSQLiteBool(fields.completed)]
    );
    return { id: insertedId(result), task: taskId, ...fields };
  }

  update(id: number, patch: Partial<SubtaskFields> & { task?: number }): Subtask | null {
    const existing = this.get(id);
    if (!existing) return null;

    const next: Subtask = { ...existing, ...patch };
    sqliteRun(
      this.db,
      `UPDATE subtasks SET task_id = ?, title = ?, completed = ? WHERE id = ?`,
      [next.task, next.title, toSQLiteBool(next.completed), id]
    );
    return next;
  }

  delete(id: number): boolean {
    return sqliteRun(this.db, `DELETE FROM subtasks WHERE id = ?`, [id]).changes > 0;
  }

  /** Delete every subtask of `taskId`; returns the number removed. */
  deleteForTask(taskId: number): number {
    return sqliteRun(this.db, `DELETE FROM subtasks WHERE task_id = ?`, [taskId]).changes;
  }
}

function toSubtask(row: SubtaskRow): Subtask {
  return {
    id: row.id,
    task: row.task_id,
    title: row.title,
    completed: row.completed === 1
  };
}
