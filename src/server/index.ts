/**
 * Taskboard HTTP Server
 * Provides the REST API over a TaskboardService
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { serve } from '@hono/node-server';

import { apiRouter } from './api/index.js';
import { errorResponse, type AppEnv } from './api/utils.js';
import { authenticate, withService } from './middleware.js';
import type { ServerConfig } from '../core/config.js';
import { createTaskboardService, type TaskboardService } from '../services/taskboard-service.js';

export interface AppOptions {
  corsOrigins?: string[];
  logRequests?: boolean;
}

/**
 * Build the application around a service. Tests call this directly and use
 * `app.request()` without binding a port.
 */
export function createApp(service: TaskboardService, options: AppOptions = {}): Hono<AppEnv> {
  const origins = options.corsOrigins ?? ['*'];
  const app = new Hono<AppEnv>({ strict: false });

  // Middleware
  app.use('/*', cors({ origin: origins.includes('*') ? '*' : origins }));
  if (options.logRequests ?? true) {
    app.use('/*', logger());
  }
  app.use('/*', withService(service));
  app.use('/api/*', authenticate);

  // API routes
  app.route('/api', apiRouter);

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  app.notFound((c) => c.json({ detail: 'Not found.' }, 404));
  app.onError((error, c) => errorResponse(c, error));

  return app;
}

type ServerInstance = ReturnType<typeof serve>;

let serverInstance: ServerInstance | null = null;
let serverService: TaskboardService | null = null;

/**
 * Start the HTTP server
 */
export async function startServer(config: ServerConfig): Promise<ServerInstance> {
  if (serverInstance) {
    return serverInstance;
  }

  const service = createTaskboardService({ dbPath: config.dbPath });
  await service.initialize();

  const app = createApp(service, {
    corsOrigins: config.corsOrigins,
    logRequests: config.logRequests
  });

  serverService = service;
  serverInstance = serve({
    fetch: app.fetch,
    hostname: config.host,
    port: config.port
  }, (info) => {
    console.log(`[server] Taskboard API listening on http://${config.host}:${info.port}`);
    console.log(`[server] Database: ${config.dbPath}`);
  });

  return serverInstance;
}

/**
 * Stop the HTTP server and close its database
 */
export async function stopServer(): Promise<void> {
  const server = serverInstance;
  const service = serverService;
  serverInstance = null;
  serverService = null;

  if (server) {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
  if (service) {
    await service.shutdown();
  }
}
