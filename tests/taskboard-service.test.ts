/**
 * Tests for TaskboardService against an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { TaskboardService } from '../src/services/taskboard-service.js';
import { NotFoundError, ValidationError, InvalidCredentialsError } from '../src/core/errors.js';
import { DEFAULT_TASK_ICON } from '../src/core/types.js';

async function expectValidationError(promise: Promise<unknown>): Promise<Record<string, string[]>> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ValidationError) return error.errors;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('TaskboardService', () => {
  let service: TaskboardService;

  async function contact(name: string): Promise<number> {
    const created = await service.createContact({
      name,
      email: `${name.toLowerCase()}@example.com`,
      phone: '+49 123'
    });
    return created.id;
  }

  beforeEach(async () => {
    service = new TaskboardService({ dbPath: ':memory:' });
    await service.initialize();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await service.shutdown();
  });

  describe('tasks', () => {
    it('creates a task with defaults and exactly the requested contacts', async () => {
      const alice = await contact('Alice');
      const bob = await contact('Bob');

      const task = await service.createTask({
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'urgent',
        contact_ids: [alice, bob]
      });

      expect(task.status).toBe('to-do');
      expect(task.board_category).toBe('to-do');
      expect(task.icon).toBe(DEFAULT_TASK_ICON);
      expect(task.description).toBeNull();
      expect(task.contact_ids).toEqual([alice, bob]);
      expect(task.contacts.map(c => c.name)).toEqual(['Alice', 'Bob']);

      const summary = await service.getSummary();
      expect(summary.urgent).toBe(1);
      expect(summary['total-tasks']).toBe(1);
    });

    it('accepts board_category as the status on create', async () => {
      const task = await service.createTask({
        title: 'Review',
        due_date: '2030-02-01',
        priority: 'low',
        board_category: 'await-feedback'
      });

      expect(task.status).toBe('await-feedback');
    });

    it('rejects disagreeing status and board_category', async () => {
      const errors = await expectValidationError(service.createTask({
        title: 'Review',
        due_date: '2030-02-01',
        priority: 'low',
        status: 'done',
        board_category: 'to-do'
      }));

      expect(errors).toEqual({ board_category: ['status and board_category must match when both are given.'] });
    });

    it('reports missing required fields and bad enum values', async () => {
      const errors = await expectValidationError(service.createTask({ title: 'x', priority: 'high' }));

      expect(Object.keys(errors).sort()).toEqual(['due_date', 'priority']);
      expect(errors.due_date).toEqual(['Required']);
    });

    it('drops unknown contact ids and keeps the known ones', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const alice = await contact('Alice');

      const task = await service.createTask({
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'medium',
        contact_ids: [alice, 42]
      });

      expect(task.contact_ids).toEqual([alice]);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('reads contacts from member_assignments and numeric strings', async () => {
      const alice = await contact('Alice');
      const bob = await contact('Bob');

      const task = await service.createTask({
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'medium',
        member_assignments: [String(alice), bob]
      });

      expect(task.contact_ids).toEqual([alice, bob]);
    });

    it('echoes back the contacts of a fetched task on PUT', async () => {
      const alice = await contact('Alice');
      const task = await service.createTask({
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'medium',
        contact_ids: [alice]
      });

      const updated = await service.updateTask(task.id, {
        title: task.title,
        due_date: task.due_date,
        priority: task.priority,
        contacts: task.contacts
      }, false);

      expect(updated.contact_ids).toEqual([alice]);
    });

    it('clears assignments when the contact field holds nothing usable', async () => {
      const alice = await contact('Alice');
      const task = await service.createTask({
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'medium',
        contact_ids: [alice]
      });

      const updated = await service.updateTask(task.id, { title: 'Renamed', contact_ids: ['x'] }, true);

      expect(updated.title).toBe('Renamed');
      expect(updated.contact_ids).toEqual([]);
    });

    it('keeps assignments on a PATCH that omits contact_ids', async () => {
      const alice = await contact('Alice');
      const task = await service.createTask({
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'medium',
        contact_ids: [alice]
      });

      const updated = await service.updateTask(task.id, { status: 'in-progress' }, true);

      expect(updated.status).toBe('in-progress');
      expect(updated.contact_ids).toEqual([alice]);
    });

    it('keeps assignments and optional fields on a PUT that omits them', async () => {
      const alice = await contact('Alice');
      const task = await service.createTask({
        title: 'T1',
        description: 'Some words',
        due_date: '2025-01-01',
        priority: 'medium',
        task_category: 'user-story',
        contact_ids: [alice]
      });

      const updated = await service.updateTask(task.id, {
        title: 'T1 v2',
        due_date: '2025-02-01',
        priority: 'low'
      }, false);

      expect(updated.title).toBe('T1 v2');
      expect(updated.description).toBe('Some words');
      expect(updated.task_category).toBe('user-story');
      expect(updated.contact_ids).toEqual([alice]);
    });

    it('requires title, due_date and priority on PUT', async () => {
      const task = await service.createTask({ title: 'T1', due_date: '2025-01-01', priority: 'medium' });

      const errors = await expectValidationError(service.updateTask(task.id, { title: 'Only title' }, false));

      expect(Object.keys(errors).sort()).toEqual(['due_date', 'priority']);
    });

    it('clears assignments on a PATCH with an empty list', async () => {
      const alice = await contact('Alice');
      const task = await service.createTask({
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'medium',
        contact_ids: [alice]
      });

      const updated = await service.updateTask(task.id, { contact_ids: [] }, true);

      expect(updated.contact_ids).toEqual([]);
      expect(updated.contacts).toEqual([]);
    });

    it('replaces subtasks with fresh ids and stays at the same count when repeated', async () => {
      const task = await service.createTask({
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'medium',
        subtasks: ['a', 'b']
      });
      const firstIds = task.subtasks.map(s => s.id);

      const once = await service.updateTask(task.id, { subtasks: ['x', 'y', 'z'] }, true);
      const onceIds = once.subtasks.map(s => s.id);
      expect(once.subtasks).toHaveLength(3);
      expect(onceIds.some(id => firstIds.includes(id))).toBe(false);

      const twice = await service.updateTask(task.id, { subtasks: ['x', 'y', 'z'] }, true);
      expect(twice.subtasks).toHaveLength(3);
      expect(twice.subtasks.map(s => s.id).some(id => onceIds.includes(id))).toBe(false);
    });

    it('gives every subtask a new id even when descriptors carry ids', async () => {
      const task = await service.createTask({
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'medium',
        subtasks: ['a', 'b']
      });
      const [a] = task.subtasks;

      const updated = await service.updateTask(task.id, {
        subtasks: [{ id: a.id, title: 'a', completed: true }]
      }, true);

      expect(updated.subtasks).toHaveLength(1);
      expect(updated.subtasks[0].id).not.toBe(a.id);
      expect(updated.subtasks[0]).toMatchObject({ task: task.id, title: 'a', completed: true });
    });

    it('reads subtask titles and flags under their alternative names', async () => {
      const task = await service.createTask({
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'medium',
        subtasks: [{ name: 'x', done: true }, { text: 'y' }, 42, 'z']
      });

      expect(task.subtasks.map(s => [s.title, s.completed])).toEqual([
        ['x', true],
        ['y', false],
        ['z', false]
      ]);
    });

    it('filters by status and returns nothing for an unknown value', async () => {
      await service.createTask({ title: 'A', due_date: '2025-01-01', priority: 'low' });
      await service.createTask({ title: 'B', due_date: '2025-01-01', priority: 'low', status: 'done' });

      expect((await service.listTasks({ status: 'done' })).map(t => t.title)).toEqual(['B']);
      expect(await service.listTasks({ status: 'archived' })).toEqual([]);
      expect(await service.listTasks()).toHaveLength(2);
    });

    it('deletes a task together with its subtasks', async () => {
      const task = await service.createTask({
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'medium',
        subtasks: ['a', 'b', 'c']
      });
      expect(await service.listSubtasks(task.id)).toHaveLength(3);

      await service.deleteTask(task.id);

      expect(await service.listSubtasks()).toEqual([]);
      await expect(service.getTask(task.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('keeps the task when an assigned contact is deleted', async () => {
      const alice = await contact('Alice');
      const bob = await contact('Bob');
      const task = await service.createTask({
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'medium',
        contact_ids: [alice, bob]
      });

      await service.deleteContact(alice);

      const reloaded = await service.getTask(task.id);
      expect(reloaded.contact_ids).toEqual([bob]);
    });
  });

  describe('subtasks', () => {
    it('creates a subtask only for an existing task', async () => {
      const task = await service.createTask({ title: 'T1', due_date: '2025-01-01', priority: 'medium' });

      const subtask = await service.createSubtask({ task: task.id, title: 'Step' });
      expect(subtask).toEqual({ id: subtask.id, task: task.id, title: 'Step', completed: false });

      const errors = await expectValidationError(service.createSubtask({ task: 999, title: 'Lost' }));
      expect(errors).toEqual({ task: ['Invalid pk "999" - object does not exist.'] });
    });

    it('toggles completion with a partial update', async () => {
      const task = await service.createTask({ title: 'T1', due_date: '2025-01-01', priority: 'medium', subtasks: ['Step'] });
      const [step] = task.subtasks;

      const updated = await service.updateSubtask(step.id, { completed: true }, true);

      expect(updated).toEqual({ id: step.id, task: task.id, title: 'Step', completed: true });
    });
  });

  describe('contacts and boards', () => {
    it('enforces unique contact emails', async () => {
      await contact('Alice');

      const errors = await expectValidationError(service.createContact({
        name: 'Other Alice',
        email: 'alice@example.com',
        phone: '1'
      }));

      expect(errors).toEqual({ email: ['contact with this email already exists.'] });
    });

    it('defaults the contact color', async () => {
      const created = await service.createContact({ name: 'Dana', email: 'dana@example.com', phone: '555' });
      expect(created.color).toBe('#000000');
    });

    it('creates, renames and deletes boards with unique names', async () => {
      const board = await service.createBoard({ name: 'Sprint 1' });
      await service.createBoard({ name: 'Sprint 2' });

      const errors = await expectValidationError(service.renameBoard(board.id, { name: 'Sprint 2' }));
      expect(errors).toEqual({ name: ['board with this name already exists.'] });

      expect(await service.renameBoard(board.id, { name: 'Sprint 1b' })).toEqual({ id: board.id, name: 'Sprint 1b' });

      await service.deleteBoard(board.id);
      expect((await service.listBoards()).map(b => b.name)).toEqual(['Sprint 2']);
    });
  });

  describe('accounts', () => {
    const registration = {
      email: 'a@example.com',
      username: 'alice',
      password: 'secret123',
      repeated_password: 'secret123'
    };

    it('registers a user that can then be found by email', async () => {
      const result = await service.register(registration);

      expect(result.email).toBe('a@example.com');
      expect(result.username).toBe('alice');
      expect(result.token).toMatch(/^[0-9a-f]{40}$/);

      const user = await service.findUserByEmail('a@example.com');
      expect(user?.id).toBe(result.user_id);
    });

    it('rejects a second registration with the same email', async () => {
      await service.register(registration);

      const errors = await expectValidationError(service.register({ ...registration, username: 'alice2' }));

      expect(errors).toEqual({ email: ['Email already exists'] });
    });

    it('rejects mismatched password confirmation', async () => {
      const errors = await expectValidationError(service.register({ ...registration, repeated_password: 'secret124' }));

      expect(errors).toEqual({ password: ['Passwords do not match'] });
    });

    it('logs in with the same token and rejects a wrong password', async () => {
      const registered = await service.register(registration);

      const login = await service.login({ email: 'A@Example.com', password: 'secret123' });
      expect(login.token).toBe(registered.token);

      await expect(service.login({ email: 'a@example.com', password: 'wrong-pass' }))
        .rejects.toBeInstanceOf(InvalidCredentialsError);
    });

    it('revokes the token on logout', async () => {
      const registered = await service.register(registration);
      expect(await service.authenticateToken(registered.token)).not.toBeNull();

      await service.logout(registered.user_id);

      expect(await service.authenticateToken(registered.token)).toBeNull();
    });

    it('updates the profile and changes the password', async () => {
      const { user_id } = await service.register(registration);

      const profile = await service.updateProfile(user_id, { bio: 'Builder', location: 'Berlin' });
      expect(profile).toEqual({ email: 'a@example.com', username: 'alice', bio: 'Builder', location: 'Berlin' });

      const errors = await expectValidationError(service.changePassword(user_id, {
        current_password: 'nope-nope',
        new_password: 'another123'
      }));
      expect(errors).toEqual({ current_password: ['Incorrect password'] });

      await service.changePassword(user_id, { current_password: 'secret123', new_password: 'another123' });
      const login = await service.login({ email: 'a@example.com', password: 'another123' });
      expect(login.user_id).toBe(user_id);
    });
  });
});
