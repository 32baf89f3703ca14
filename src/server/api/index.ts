/**
 * API Router
 * Central router for all API endpoints
 */

import { Hono } from 'hono';
import { tasksRouter } from './tasks.js';
import { subtasksRouter } from './subtasks.js';
import { contactsRouter } from './contacts.js';
import { boardsRouter } from './boards.js';
import { summaryRouter } from './summary.js';
import { boardRouter } from './board.js';
import { authRouter } from './auth.js';
import { healthRouter } from './health.js';
import type { AppEnv } from './utils.js';

export const apiRouter = new Hono<AppEnv>()
  .route('/tasks', tasksRouter)
  .route('/subtasks', subtasksRouter)
  .route('/contacts', contactsRouter)
  .route('/boards', boardsRouter)
  .route('/summary', summaryRouter)
  .route('/board', boardRouter)
  .route('/auth', authRouter)
  .route('/health', healthRouter);
