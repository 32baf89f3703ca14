/**
 * Task Repository - task rows and their contact links
 */

import type { TaskCategory, TaskPriority, TaskRow, TaskStatus } from '../types.js';
import {
  insertedId,
  sqliteAll,
  sqliteGet,
  sqliteRun,
  type SQLiteDatabase
} from '../sqlite-wrapper.js';

interface TaskDbRow {
  id: number;
  title: string;
  description: string | null;
  due_date: string;
  priority: TaskPriority;
  status: TaskStatus;
  task_category: TaskCategory | null;
  icon: string | null;
}

export type TaskFields = Omit<TaskRow, 'id' | 'board_category'>;

export class TaskRepo {
  constructor(private readonly db: SQLiteDatabase) {}

  /**
   * List tasks in id order, optionally restricted to one status column value.
   */
  list(status?: string): TaskRow[] {
    const rows = status === undefined
      ? sqliteAll<TaskDbRow>(this.db, `SELECT * FROM tasks ORDER BY id`)
      : sqliteAll<TaskDbRow>(this.db, `SELECT * FROM tasks WHERE status = ? ORDER BY id`, [status]);
    return rows.map(toTaskRow);
  }

  get(id: number): TaskRow | null {
    const row = sqliteGet<TaskDbRow>(this.db, `SELECT * FROM tasks WHERE id = ?`, [id]);
    return row ? toTaskRow(row) : null;
  }

  exists(id: number): boolean {
    return sqliteGet<{ id: number }>(this.db, `SELECT id FROM tasks WHERE id = ?`, [id]) !== undefined;
  }

  count(): number {
    return sqliteGet<{ n: number }>(this.db, `SELECT COUNT(*) AS n FROM tasks`)?.n ?? 0;
  }

  create(fields: TaskFields): TaskRow {
    const result = sqliteRun(
      this.db,
      `INSERT INTO tasks (title, description, due_date, priority, status, task_category, icon)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        fields.title,
        fields.description,
        fields.due_date,
        fields.priority,
        fields.status,
        fields.task_category,
        fields.icon
      ]
    );
    return { id: insertedId(result), ...fields, board_category: fields.status };
  }

  update(id: number, fields: TaskFields): TaskRow {
    sqliteRun(
      this.db,
      `UPDATE tasks
       SET title = ?, description = ?, due_date = ?, priority = ?, status = ?, task_category = ?, icon = ?
       WHERE id = ?`,
      [
        fields.title,
        fields.description,
        fields.due_date,
        fields.priority,
        fields.status,
        fields.task_category,
        fields.icon,
        id
      ]
    );
    return { id, ...fields, board_category: fields.status };
  }

  delete(id: number): boolean {
    return sqliteRun(this.db, `DELETE FROM tasks WHERE id = ?`, [id]).changes > 0;
  }

  // ── Contact links ─────────────────────────────────────

  contactIds(taskId: number): number[] {
    return sqliteAll<{ contact_id: number }>(
      this.db,
      `SELECT contact_id FROM task_contacts WHERE task_id = ? ORDER BY contact_id`,
      [taskId]
    ).map(row => row.contact_id);
  }

  linkContact(taskId: number, contactId: number): void {
    sqliteRun(
      this.db,
      `INSERT OR IGNORE INTO task_contacts (task_id, contact_id) VALUES (?, ?)`,
      [taskId, contactId]
    );
  }

  unlinkContact(taskId: number, contactId: number): void {
    sqliteRun(
      this.db,
      `DELETE FROM task_contacts WHERE task_id = ? AND contact_id = ?`,
      [taskId, contactId]
    );
  }
}

function toTaskRow(row: TaskDbRow): TaskRow {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    due_date: row.due_date,
    priority: row.priority,
    status: row.status,
    board_category: row.status,
    task_category: row.task_category,
    icon: row.icon
  };
}
