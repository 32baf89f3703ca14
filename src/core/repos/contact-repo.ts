/**
 * Contact Repository - CRUD for people that tasks can be assigned to
 */

import type { Contact, ContactInput, ContactPatch } from '../types.js';
import {
  insertedId,
  sqliteAll,
  sqliteGet,
  sqliteRun,
  type SQLiteDatabase
} from '../sqlite-wrapper.js';

interface ContactRow {
  id: number;
  name: string;
  email: string;
  phone: string;
  color: string;
}

export class ContactRepo {
  constructor(private readonly db: SQLiteDatabase) {}

  list(): Contact[] {
    return sqliteAll<ContactRow>(this.db, `SELECT * FROM contacts ORDER BY id`).map(toContact);
  }

  get(id: number): Contact | null {
    const row = sqliteGet<ContactRow>(this.db, `SELECT * FROM contacts WHERE id = ?`, [id]);
    return row ? toContact(row) : null;
  }

  /**
   * Return the subset of `ids` that name existing contacts.
   */
  existingIds(ids: readonly number[]): Set<number> {
    if (ids.length === 0) return new Set();
    const placeholders = ids.map(() => '?').join(', ');
    const rows = sqliteAll<{ id: number }>(
      this.db,
      `SELECT id FROM contacts WHERE id IN (${placeholders})`,
      [...ids]
    );
    return new Set(rows.map(row => row.id));
  }

  /**
   * Contacts assigned to a task, ordered by contact id.
   */
  listForTask(taskId: number): Contact[] {
    return sqliteAll<ContactRow>(
      this.db,
      `SELECT c.* FROM contacts c
       JOIN task_contacts tc ON tc.contact_id = c.id
       WHERE tc.task_id = ?
       ORDER BY c.id`,
      [taskId]
    ).map(toContact);
  }

  isEmailTaken(email: string, excludeId?: number): boolean {
    const row = sqliteGet<{ id: number }>(
      this.db,
      `SELECT id FROM contacts WHERE lower(email) = lower(?) AND id != ?`,
      [email, excludeId ?? 0]
    );
    return row !== undefined;
  }

  create(input: ContactInput): Contact {
    const result = sqliteRun(
      this.db,
      `INSERT INTO contacts (name, email, phone, color) VALUES (?, ?, ?, ?)`,
      [input.name, input.email, input.phone, input.color]
    );
    return { id: insertedId(result), ...input };
  }

  update(id: number, patch: ContactPatch): Contact | null {
    const existing = this.get(id);
    if (!existing) return null;

    const next: Contact = { ...existing, ...patch };
    sqliteRun(
      this.db,
      `UPDATE contacts SET name = ?, email = ?, phone = ?, color = ? WHERE id = ?`,
      [next.name, next.email, next.phone, next.color, id]
    );
    return next;
  }

  /**
   * Delete a contact. Task links go with it (ON DELETE CASCADE); tasks stay.
   */
  delete(id: number): boolean {
    return sqliteRun(this.db, `DELETE FROM contacts WHERE id = ?`, [id]).changes > 0;
  }
}

function toContact(row: ContactRow): Contact {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    phone: row.phone,
    color: row.color
  };
}
