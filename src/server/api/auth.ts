/**
 * Auth API
 * Registration, token login/logout, profile and password changes
 */

import { Hono, type Context } from 'hono';
import { allowAny, isAuthenticated } from '../../core/auth/index.js';
import { AuthenticationError } from '../../core/errors.js';
import type { AuthUser } from '../../core/types.js';
import { requireAccess } from '../middleware.js';
import { errorResponse, readJsonBody, type AppEnv } from './utils.js';

export const authRouter = new Hono<AppEnv>();

function currentUser(c: Context<AppEnv>): AuthUser {
  const user = c.get('user');
  if (!user) throw new AuthenticationError();
  return user;
}

// POST /api/auth/register
authRouter.post('/register', requireAccess(allowAny), async (c) => {
  try {
    const result = await c.get('service').register(await readJsonBody(c));
    return c.json(result, 201);
  } catch (error) {
    return errorResponse(c, error);
  }
});

// POST /api/auth/login
authRouter.post('/login', requireAccess(allowAny), async (c) => {
  try {
    const result = await c.get('service').login(await readJsonBody(c));
    return c.json(result);
  } catch (error) {
    return errorResponse(c, error);
  }
});

// POST /api/auth/logout - Revokes the caller's token
authRouter.post('/logout', requireAccess(isAuthenticated), async (c) => {
  try {
    await c.get('service').logout(currentUser(c).id);
    return c.body(null, 204);
  } catch (error) {
    return errorResponse(c, error);
  }
});

authRouter.get('/profile', requireAccess(isAuthenticated), async (c) => {
  try {
    return c.json(await c.get('service').getProfile(currentUser(c).id));
  } catch (error) {
    return errorResponse(c, error);
  }
});

authRouter.patch('/profile', requireAccess(isAuthenticated), async (c) => {
  try {
    const profile = await c.get('service').updateProfile(currentUser(c).id, await readJsonBody(c));
    return c.json(profile);
  } catch (error) {
    return errorResponse(c, error);
  }
});

// POST /api/auth/password
authRouter.post('/password', requireAccess(isAuthenticated), async (c) => {
  try {
    await c.get('service').changePassword(currentUser(c).id, await readJsonBody(c));
    return c.body(null, 204);
  } catch (error) {
    return errorResponse(c, error);
  }
});
