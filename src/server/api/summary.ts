/**
 * Summary API
 * Counts per status, urgent count and completion percentage
 */

import { Hono } from 'hono';
import { isAuthenticatedOrGuest } from '../../core/auth/index.js';
import { requireAccess } from '../middleware.js';
import { errorResponse, type AppEnv } from './utils.js';

export const summaryRouter = new Hono<AppEnv>();

summaryRouter.use('*', requireAccess(isAuthenticatedOrGuest));

// GET /api/summary
summaryRouter.get('/', async (c) => {
  try {
    return c.json(await c.get('service').getSummary());
  } catch (error) {
    return errorResponse(c, error);
  }
});
