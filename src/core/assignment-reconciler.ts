/**
 * Assignment Reconciler
 * Converges a task's assigned contacts and its subtask list to the state
 * requested by a create or update payload.
 *
 * Payloads arrive in several shapes, so extraction is best-effort: anything
 * that does not parse is dropped and the rest is applied. Contacts use set
 * semantics; a non-empty subtask list replaces every existing subtask.
 */

import type { ContactRepo } from './repos/contact-repo.js';
import type { SubtaskRepo } from './repos/subtask-repo.js';
import type { TaskRepo } from './repos/task-repo.js';

export type ReconcileMode = 'create' | 'update';

/** Payload keys that may carry contact ids, highest priority first. */
export const CONTACT_ID_FIELDS = ['contact_ids', 'member_assignments', 'contacts'] as const;

const SUBTASK_TITLE_FIELDS = ['title', 'name', 'text'] as const;
const SUBTASK_COMPLETED_FIELDS = ['completed', 'done', 'finished'] as const;

export const UNTITLED_SUBTASK = 'Untitled subtask';
const MAX_SUBTASK_TITLE = 255;

export interface AssignmentRequest {
  /** `undefined` means no contact field was present in the payload. */
  contactIds?: readonly number[];
  /** Raw `subtasks` entries; `undefined` when the field is absent or not a list. */
  subtasks?: readonly unknown[];
}

export interface NormalizedSubtask {
  title: string;
  completed: boolean;
}

export interface SkippedSubtask {
  title: string;
  error: string;
}

export interface ReconcileResult {
  contactIds: number[];
  subtasks: {
    created: number;
    removed: number;
    /** Entries that were neither a string nor an object. */
    ignored: number;
    skipped: SkippedSubtask[];
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A positive integer id from a number or a numeric string, else null. */
function toContactId(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value > 0 ? value : null;
  }
  if (typeof value === 'string') {
    const s = value.trim();
    if (!/^\d+$/.test(s)) return null;
    const id = parseInt(s, 10);
    return id > 0 ? id : null;
  }
  return null;
}

function idOf(value: unknown): number | null {
  return isRecord(value) ? toContactId(value.id) : toContactId(value);
}

/**
 * Parse one contact field value into ids, dropping whatever does not parse.
 *
 * Accepts a list of ids, numeric strings or `{ id }` objects; a mapping keyed
 * by numeric strings or holding `{ id }` values; a comma-separated string;
 * or a single scalar.
 */
export function parseContactIds(value: unknown): number[] {
  let ids: Array<number | null>;

  if (Array.isArray(value)) {
    ids = value.map(idOf);
  } else if (isRecord(value)) {
    ids = 'id' in value
      ? [toContactId(value.id)]
      : Object.entries(value).map(([key, entry]) => (isRecord(entry) ? idOf(entry) : toContactId(key)));
  } else if (typeof value === 'string') {
    ids = value.split(',').map(toContactId);
  } else {
    ids = [toContactId(value)];
  }

  return uniqueContactIds(ids.filter((id): id is number => id !== null));
}

/**
 * Pick the contact ids out of a payload. The first recognised field that
 * yields ids wins; a recognised field that yields none gives `[]`; no
 * recognised field (or only nulls) gives `undefined`.
 */
export function extractContactIds(payload: unknown): number[] | undefined {
  if (!isRecord(payload)) return undefined;

  let present = false;
  for (const field of CONTACT_ID_FIELDS) {
    const value = payload[field];
    if (value === undefined || value === null) continue;
    present = true;
    const ids = parseContactIds(value);
    if (ids.length > 0) return ids;
  }
  return present ? [] : undefined;
}

export function extractSubtasks(payload: unknown): unknown[] | undefined {
  if (!isRecord(payload)) return undefined;
  const value = payload.subtasks;
  return Array.isArray(value) ? value : undefined;
}

export function extractAssignmentRequest(payload: unknown): AssignmentRequest {
  return {
    contactIds: extractContactIds(payload),
    subtasks: extractSubtasks(payload)
  };
}

function clampTitle(title: string): string {
  const trimmed = title.trim();
  return trimmed.length > 0 ? trimmed.slice(0, MAX_SUBTASK_TITLE) : UNTITLED_SUBTASK;
}

/**
 * Read a subtask descriptor: a bare title, or an object with its title under
 * `title`, `name` or `text` and its flag under `completed`, `done` or
 * `finished`. Anything else yields null.
 */
export function normalizeSubtaskDescriptor(descriptor: unknown): NormalizedSubtask | null {
  if (typeof descriptor === 'string') {
    return { title: clampTitle(descriptor), completed: false };
  }
  if (!isRecord(descriptor)) return null;

  const titleField = SUBTASK_TITLE_FIELDS.find(field => typeof descriptor[field] === 'string');
  const rawTitle = titleField === undefined ? undefined : descriptor[titleField];

  return {
    title: typeof rawTitle === 'string' ? clampTitle(rawTitle) : UNTITLED_SUBTASK,
    completed: SUBTASK_COMPLETED_FIELDS.some(field => Boolean(descriptor[field]))
  };
}

/** De-duplicate while keeping first-seen order. */
export function uniqueContactIds(ids: readonly number[]): number[] {
  return [...new Set(ids)];
}

export class AssignmentReconciler {
  constructor(
    private readonly tasks: TaskRepo,
    private readonly contacts: ContactRepo,
    private readonly subtasks: SubtaskRepo
  ) {}

  /**
   * Apply `request` to `taskId`. Callers run this inside the same
   * transaction as the task row write.
   */
  apply(taskId: number, request: AssignmentRequest, mode: ReconcileMode): ReconcileResult {
    return {
      contactIds: this.reconcileContacts(taskId, request.contactIds, mode),
      subtasks: this.reconcileSubtasks(taskId, request.subtasks)
    };
  }

  /**
   * On create an absent field means no assignments. On update it leaves the
   * current set alone, while an explicit empty list clears it. Ids naming no
   * contact are dropped.
   */
  reconcileContacts(taskId: number, contactIds: readonly number[] | undefined, mode: ReconcileMode): number[] {
    const current = this.tasks.contactIds(taskId);

    if (contactIds === undefined) {
      if (mode === 'update') return current;
      contactIds = [];
    }

    const requested = uniqueContactIds(contactIds);
    const known = this.contacts.existingIds(requested);
    const unknown = requested.filter(id => !known.has(id));
    if (unknown.length > 0) {
      console.warn(`[AssignmentReconciler] ignoring unknown contact ids for task ${taskId}:`, unknown.join(', '));
    }

    const target = new Set(requested.filter(id => known.has(id)));
    const currentSet = new Set(current);

    for (const id of current) {
      if (!target.has(id)) this.tasks.unlinkContact(taskId, id);
    }
    for (const id of target) {
      if (!currentSet.has(id)) this.tasks.linkContact(taskId, id);
    }

    return [...target].sort((a, b) => a - b);
  }

  /**
   * An absent or empty list never touches existing subtasks. A non-empty one
   * deletes them all and creates one subtask per usable descriptor, in order.
   */
  reconcileSubtasks(taskId: number, descriptors: readonly unknown[] | undefined): ReconcileResult['subtasks'] {
    const result: ReconcileResult['subtasks'] = { created: 0, removed: 0, ignored: 0, skipped: [] };
    if (!descriptors || descriptors.length === 0) return result;

    result.removed = this.subtasks.deleteForTask(taskId);

    for (const descriptor of descriptors) {
      const subtask = normalizeSubtaskDescriptor(descriptor);
      if (!subtask) {
        result.ignored++;
        continue;
      }

      try {
        this.subtasks.create(taskId, subtask);
        result.created++;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[AssignmentReconciler] skipped subtask "${subtask.title}" of task ${taskId}:`, message);
        result.skipped.push({ title: subtask.title, error: message });
      }
    }

    return result;
  }
}
