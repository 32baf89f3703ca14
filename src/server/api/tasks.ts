/**
 * Tasks API
 * CRUD for tasks, including their contact assignments and subtask lists
 */

import { Hono } from 'hono';
import { isAuthenticatedOrGuest } from '../../core/auth/index.js';
import { requireAccess } from '../middleware.js';
import { errorResponse, parseId, readJsonBody, type AppEnv } from './utils.js';

export const tasksRouter = new Hono<AppEnv>();

tasksRouter.use('*', requireAccess(isAuthenticatedOrGuest));

// GET /api/tasks - List tasks, optionally by ?board_category= (or ?status=)
tasksRouter.get('/', async (c) => {
  const status = c.req.query('board_category') || c.req.query('status') || undefined;

  try {
    const tasks = await c.get('service').listTasks({ status });
    return c.json(tasks);
  } catch (error) {
    return errorResponse(c, error);
  }
});

// POST /api/tasks - Create a task
tasksRouter.post('/', async (c) => {
  try {
    const body = await readJsonBody(c);
    const task = await c.get('service').createTask(body);
    return c.json(task, 201);
  } catch (error) {
    return errorResponse(c, error);
  }
});

// GET /api/tasks/:id
tasksRouter.get('/:id', async (c) => {
  try {
    const task = await c.get('service').getTask(parseId(c.req.param('id')));
    return c.json(task);
  } catch (error) {
    return errorResponse(c, error);
  }
});

// PUT /api/tasks/:id - Full update; title, due_date and priority are required
tasksRouter.put('/:id', async (c) => {
  try {
    const id = parseId(c.req.param('id'));
    const body = await readJsonBody(c);
    const task = await c.get('service').updateTask(id, body, false);
    return c.json(task);
  } catch (error) {
    return errorResponse(c, error);
  }
});

// PATCH /api/tasks/:id - Partial update
tasksRouter.patch('/:id', async (c) => {
  try {
    const id = parseId(c.req.param('id'));
    const body = await readJsonBody(c);
    const task = await c.get('service').updateTask(id, body, true);
    return c.json(task);
  } catch (error) {
    return errorResponse(c, error);
  }
});

// DELETE /api/tasks/:id - Subtasks are deleted with the task
tasksRouter.delete('/:id', async (c) => {
  try {
    await c.get('service').deleteTask(parseId(c.req.param('id')));
    return c.body(null, 204);
  } catch (error) {
    return errorResponse(c, error);
  }
});
