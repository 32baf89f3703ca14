/**
 * Subtasks API
 * Direct access to subtasks; ?task=<id> narrows the list to one task
 */

import { Hono } from 'hono';
import { isAuthenticatedOrGuest } from '../../core/auth/index.js';
import { requireAccess } from '../middleware.js';
import { errorResponse, parseId, parseOptionalIdQuery, readJsonBody, type AppEnv } from './utils.js';

export const subtasksRouter = new Hono<AppEnv>();

subtasksRouter.use('*', requireAccess(isAuthenticatedOrGuest));

subtasksRouter.get('/', async (c) => {
  try {
    const taskId = parseOptionalIdQuery('task', c.req.query('task'));
    return c.json(await c.get('service').listSubtasks(taskId));
  } catch (error) {
    return errorResponse(c, error);
  }
});

subtasksRouter.post('/', async (c) => {
  try {
    const subtask = await c.get('service').createSubtask(await readJsonBody(c));
    return c.json(subtask, 201);
  } catch (error) {
    return errorResponse(c, error);
  }
});

subtasksRouter.get('/:id', async (c) => {
  try {
    return c.json(await c.get('service').getSubtask(parseId(c.req.param('id'))));
  } catch (error) {
    return errorResponse(c, error);
  }
});

subtasksRouter.put('/:id', async (c) => {
  try {
    const id = parseId(c.req.param('id'));
    return c.json(await c.get('service').updateSubtask(id, await readJsonBody(c), false));
  } catch (error) {
    return errorResponse(c, error);
  }
});

subtasksRouter.patch('/:id', async (c) => {
  try {
    const id = parseId(c.req.param('id'));
    return c.json(await c.get('service').updateSubtask(id, await readJsonBody(c), true));
  } catch (error) {
    return errorResponse(c, error);
  }
});

subtasksRouter.delete('/:id', async (c) => {
  try {
    await c.get('service').deleteSubtask(parseId(c.req.param('id')));
    return c.body(null, 204);
  } catch (error) {
    return errorResponse(c, error);
  }
});
