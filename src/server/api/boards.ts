/**
 * Boards API
 * Named workspaces
 */

import { Hono } from 'hono';
import { isAuthenticatedOrGuest } from '../../core/auth/index.js';
import { requireAccess } from '../middleware.js';
import { errorResponse, parseId, readJsonBody, type AppEnv } from './utils.js';

export const boardsRouter = new Hono<AppEnv>();

boardsRouter.use('*', requireAccess(isAuthenticatedOrGuest));

boardsRouter.get('/', async (c) => {
  try {
    return c.json(await c.get('service').listBoards());
  } catch (error) {
    return errorResponse(c, error);
  }
});

boardsRouter.post('/', async (c) => {
  try {
    const board = await c.get('service').createBoard(await readJsonBody(c));
    return c.json(board, 201);
  } catch (error) {
    return errorResponse(c, error);
  }
});

boardsRouter.get('/:id', async (c) => {
  try {
    return c.json(await c.get('service').getBoard(parseId(c.req.param('id'))));
  } catch (error) {
    return errorResponse(c, error);
  }
});

boardsRouter.on(['PUT', 'PATCH'], '/:id', async (c) => {
  try {
    const id = parseId(c.req.param('id'));
    return c.json(await c.get('service').renameBoard(id, await readJsonBody(c)));
  } catch (error) {
    return errorResponse(c, error);
  }
});

boardsRouter.delete('/:id', async (c) => {
  try {
    await c.get('service').deleteBoard(parseId(c.req.param('id')));
    return c.body(null, 204);
  } catch (error) {
    return errorResponse(c, error);
  }
});
