/**
 * Board API
 * Flat task rows for rendering the kanban columns
 */

import { Hono } from 'hono';
import { isAuthenticatedOrGuest } from '../../core/auth/index.js';
import { requireAccess } from '../middleware.js';
import { errorResponse, type AppEnv } from './utils.js';

export const boardRouter = new Hono<AppEnv>();

boardRouter.use('*', requireAccess(isAuthenticatedOrGuest));

// GET /api/board
boardRouter.get('/', async (c) => {
  try {
    const rows = await c.get('service').getBoardOverview();
    return c.json({ board: rows });
  } catch (error) {
    return errorResponse(c, error);
  }
});
