/**
 * Request middleware
 * Service injection, token authentication and access policy checks
 */

import { createMiddleware } from 'hono/factory';
import type { AccessPolicy } from '../core/auth/index.js';
import type { AuthUser } from '../core/types.js';
import type { TaskboardService } from '../services/taskboard-service.js';
import type { AppEnv } from './api/utils.js';

const TOKEN_SCHEMES = new Set(['token', 'bearer']);

/**
 * Extract the key from `Authorization: Token <key>` (or `Bearer <key>`).
 */
export function parseAuthorizationHeader(header: string | undefined): string | null {
  if (!header) return null;
  const [scheme, key, ...rest] = header.trim().split(/\s+/);
  if (!scheme || !key || rest.length > 0) return null;
  return TOKEN_SCHEMES.has(scheme.toLowerCase()) ? key : null;
}

export function withService(service: TaskboardService) {
  return createMiddleware<AppEnv>(async (c, next) => {
    c.set('service', service);
    await next();
  });
}

/**
 * Resolve the request's user from its token. No header means anonymous; a
 * header with an unknown token is rejected outright.
 */
export const authenticate = createMiddleware<AppEnv>(async (c, next) => {
  const header = c.req.header('Authorization');
  const key = parseAuthorizationHeader(header);

  if (header && !key) {
    return c.json({ detail: 'Invalid token header.' }, 401);
  }

  let user: AuthUser | null = null;
  if (key) {
    user = await c.get('service').authenticateToken(key);
    if (!user) {
      return c.json({ detail: 'Invalid token.' }, 401);
    }
  }

  c.set('user', user);
  await next();
});

export function requireAccess(policy: AccessPolicy) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const allowed = policy.allows({
      user: c.get('user'),
      guestId: c.req.query('guest_id') ?? null
    });
    if (!allowed) {
      return c.json({ detail: 'Authentication credentials were not provided.' }, 401);
    }
    await next();
  });
}
