/**
 * Health API
 * Liveness plus a database round trip
 */

import { Hono } from 'hono';
import type { AppEnv } from './utils.js';

export const healthRouter = new Hono<AppEnv>();

// GET /api/health
healthRouter.get('/', async (c) => {
  try {
    const tasks = await c.get('service').countTasks();
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      tasks
    });
  } catch (error) {
    console.error('[api] health check failed:', error);
    return c.json({
      status: 'error',
      timestamp: new Date().toISOString(),
      error: error instanceof Error ? error.message : String(error)
    }, 500);
  }
});
