/**
 * HTTP tests: drive the Hono app in process with app.request().
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';

import { createApp } from '../src/server/index.js';
import { TaskboardService } from '../src/services/taskboard-service.js';
import {
  AuthResultSchema,
  BoardSchema,
  ContactSchema,
  ProfileSchema,
  SubtaskSchema,
  TaskRowSchema,
  TaskSchema,
  TaskSummarySchema
} from '../src/core/types.js';

const FieldErrorsSchema = z.record(z.array(z.string()));
const DetailSchema = z.object({ detail: z.string() });

describe('HTTP API', () => {
  let service: TaskboardService;
  let app: ReturnType<typeof createApp>;

  function send(method: string, path: string, body?: unknown, token?: string): Promise<Response> {
    const headers: Record<string, string> = {};
    if (body !== undefined) headers['Content-Type'] = 'application/json';
    if (token) headers.Authorization = `Token ${token}`;
    return Promise.resolve(app.request(path, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body)
    }));
  }

  async function register(username = 'alice'): Promise<string> {
    const res = await send('POST', '/api/auth/register', {
      email: `${username}@example.com`,
      username,
      password: 'secret123',
      repeated_password: 'secret123'
    });
    return AuthResultSchema.parse(await res.json()).token;
  }

  beforeEach(async () => {
    service = new TaskboardService({ dbPath: ':memory:' });
    await service.initialize();
    app = createApp(service, { logRequests: false });
  });

  afterEach(async () => {
    await service.shutdown();
  });

  describe('access', () => {
    it('rejects anonymous task requests without guest_id', async () => {
      const res = await send('GET', '/api/tasks');

      expect(res.status).toBe(401);
      expect(DetailSchema.parse(await res.json())).toEqual({
        detail: 'Authentication credentials were not provided.'
      });
    });

    it('lets guests in with a guest_id query parameter', async () => {
      const res = await send('GET', '/api/tasks/?guest_id=guest-1');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([]);
    });

    it('lets authenticated users in', async () => {
      const token = await register();

      const res = await send('GET', '/api/summary', undefined, token);

      expect(res.status).toBe(200);
      expect(TaskSummarySchema.parse(await res.json())['total-tasks']).toBe(0);
    });

    it('rejects an unknown token even on open routes', async () => {
      const res = await send('GET', '/api/contacts', undefined, 'not-a-real-token');

      expect(res.status).toBe(401);
      expect(DetailSchema.parse(await res.json())).toEqual({ detail: 'Invalid token.' });
    });

    it('serves contacts to anonymous callers', async () => {
      const res = await send('GET', '/api/contacts/');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([]);
    });
  });

  describe('tasks', () => {
    it('creates a task and reflects it in the summary and board', async () => {
      const token = await register();
      const contactIds: number[] = [];
      for (const name of ['Ann', 'Ben']) {
        const res = await send('POST', '/api/contacts', { name, email: `${name}@example.com`, phone: '123' });
        expect(res.status).toBe(201);
        contactIds.push(ContactSchema.parse(await res.json()).id);
      }

      const created = await send('POST', '/api/tasks', {
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'urgent',
        contact_ids: contactIds,
        subtasks: ['first']
      }, token);
      expect(created.status).toBe(201);
      const task = TaskSchema.parse(await created.json());
      expect(task.contacts).toHaveLength(2);
      expect(task.subtasks.map(s => s.title)).toEqual(['first']);

      const summary = TaskSummarySchema.parse(await (await send('GET', '/api/summary/', undefined, token)).json());
      expect(summary.urgent).toBe(1);

      const board = z.object({ board: z.array(TaskRowSchema) })
        .parse(await (await send('GET', '/api/board', undefined, token)).json());
      expect(board.board.map(row => row.title)).toEqual(['T1']);
    });

    it('accepts contacts under member_assignments and tolerant subtask shapes', async () => {
      const token = await register();
      const contact = ContactSchema.parse(await (await send('POST', '/api/contacts', {
        name: 'Cleo', email: 'cleo@example.com', phone: '123'
      })).json());

      const res = await send('POST', '/api/tasks', {
        title: 'T2',
        due_date: '2025-01-01',
        priority: 'low',
        member_assignments: `${contact.id}`,
        subtasks: [{ name: 'x', done: true }, 7, 'y']
      }, token);

      expect(res.status).toBe(201);
      const task = TaskSchema.parse(await res.json());
      expect(task.contact_ids).toEqual([contact.id]);
      expect(task.subtasks.map(s => [s.title, s.completed])).toEqual([['x', true], ['y', false]]);
    });

    it('filters by board_category', async () => {
      const token = await register();
      await send('POST', '/api/tasks', { title: 'A', due_date: '2025-01-01', priority: 'low' }, token);
      await send('POST', '/api/tasks', { title: 'B', due_date: '2025-01-01', priority: 'low', board_category: 'done' }, token);

      const res = await send('GET', '/api/tasks?board_category=done', undefined, token);

      expect(z.array(TaskSchema).parse(await res.json()).map(t => t.title)).toEqual(['B']);
    });

    it('returns field errors for an invalid payload', async () => {
      const token = await register();

      const res = await send('POST', '/api/tasks', { title: 'T', due_date: '01/02/2025', priority: 'low' }, token);

      expect(res.status).toBe(400);
      expect(FieldErrorsSchema.parse(await res.json())).toEqual({
        due_date: ['Date has wrong format. Use YYYY-MM-DD.']
      });
    });

    it('returns a non-field error for malformed JSON', async () => {
      const token = await register();

      const res = await app.request('/api/tasks', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: `Token ${token}` },
        body: '{"title": '
      });

      expect(res.status).toBe(400);
      expect(FieldErrorsSchema.parse(await res.json())).toEqual({
        non_field_errors: ['JSON parse error - request body is not valid JSON.']
      });
    });

    it('patches, puts and deletes a task', async () => {
      const token = await register();
      const created = TaskSchema.parse(await (await send('POST', '/api/tasks', {
        title: 'T1',
        due_date: '2025-01-01',
        priority: 'medium'
      }, token)).json());

      const patched = await send('PATCH', `/api/tasks/${created.id}`, { status: 'in-progress' }, token);
      expect(TaskSchema.parse(await patched.json()).board_category).toBe('in-progress');

      const put = await send('PUT', `/api/tasks/${created.id}`, { title: 'T1 final', due_date: '2025-03-01', priority: 'urgent' }, token);
      const replaced = TaskSchema.parse(await put.json());
      expect(replaced.title).toBe('T1 final');
      expect(replaced.status).toBe('in-progress');

      const deleted = await send('DELETE', `/api/tasks/${created.id}`, undefined, token);
      expect(deleted.status).toBe(204);

      const missing = await send('GET', `/api/tasks/${created.id}`, undefined, token);
      expect(missing.status).toBe(404);
      expect(DetailSchema.parse(await missing.json())).toEqual({ detail: 'Not found.' });
    });

    it('treats a non-numeric id as not found', async () => {
      const token = await register();

      const res = await send('GET', '/api/tasks/abc', undefined, token);

      expect(res.status).toBe(404);
    });
  });

  describe('subtasks and boards', () => {
    it('lists subtasks for one task', async () => {
      const token = await register();
      const first = TaskSchema.parse(await (await send('POST', '/api/tasks', {
        title: 'First', due_date: '2025-01-01', priority: 'low', subtasks: ['a', 'b']
      }, token)).json());
      await send('POST', '/api/tasks', { title: 'Second', due_date: '2025-01-01', priority: 'low', subtasks: ['c'] }, token);

      const res = await send('GET', `/api/subtasks?task=${first.id}`, undefined, token);
      expect(z.array(SubtaskSchema).parse(await res.json()).map(s => s.title)).toEqual(['a', 'b']);

      const bad = await send('GET', '/api/subtasks?task=abc', undefined, token);
      expect(bad.status).toBe(400);
      expect(FieldErrorsSchema.parse(await bad.json())).toEqual({ task: ['A valid integer is required.'] });
    });

    it('creates and renames a board', async () => {
      const token = await register();

      const created = await send('POST', '/api/boards', { name: 'Launch' }, token);
      expect(created.status).toBe(201);
      const board = BoardSchema.parse(await created.json());

      const renamed = await send('PATCH', `/api/boards/${board.id}`, { name: 'Launch v2' }, token);
      expect(BoardSchema.parse(await renamed.json())).toEqual({ id: board.id, name: 'Launch v2' });
    });
  });

  describe('auth', () => {
    it('registers with 201 and rejects a duplicate email', async () => {
      const payload = {
        email: 'a@example.com',
        username: 'alice',
        password: 'secret123',
        repeated_password: 'secret123'
      };

      const first = await send('POST', '/api/auth/register', payload);
      expect(first.status).toBe(201);
      expect(AuthResultSchema.parse(await first.json()).email).toBe('a@example.com');

      const second = await send('POST', '/api/auth/register', { ...payload, username: 'alice2' });
      expect(second.status).toBe(400);
      expect(FieldErrorsSchema.parse(await second.json())).toEqual({ email: ['Email already exists'] });
    });

    it('answers bad credentials without naming the field', async () => {
      await register();

      const res = await send('POST', '/api/auth/login', { email: 'alice@example.com', password: 'wrong-pass' });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'Invalid credentials' });
    });

    it('reads and patches the profile', async () => {
      const token = await register();

      const patched = await send('PATCH', '/api/auth/profile', { location: 'Hamburg' }, token);
      expect(ProfileSchema.parse(await patched.json())).toEqual({
        email: 'alice@example.com',
        username: 'alice',
        bio: null,
        location: 'Hamburg'
      });

      const anonymous = await send('GET', '/api/auth/profile');
      expect(anonymous.status).toBe(401);
    });

    it('revokes the token on logout', async () => {
      const token = await register();

      const res = await send('POST', '/api/auth/logout', undefined, token);
      expect(res.status).toBe(204);

      const after = await send('GET', '/api/auth/profile', undefined, token);
      expect(after.status).toBe(401);
      expect(DetailSchema.parse(await after.json())).toEqual({ detail: 'Invalid token.' });
    });
  });

  describe('health', () => {
    it('reports status and task count', async () => {
      const res = await send('GET', '/api/health');

      expect(res.status).toBe(200);
      const body = z.object({ status: z.string(), tasks: z.number() }).parse(await res.json());
      expect(body).toEqual({ status: 'ok', tasks: 0 });
    });

    it('returns a JSON 404 for unknown routes', async () => {
      const res = await send('GET', '/api/nothing-here');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ detail: 'Not found.' });
    });
  });
});
