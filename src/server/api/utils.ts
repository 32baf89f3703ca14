/**
 * API Utilities
 * Shared context typing and helpers for API endpoints
 */

import type { Context } from 'hono';
import type { TaskboardService } from '../../services/taskboard-service.js';
import type { AuthUser } from '../../core/types.js';
import {
  AuthenticationError,
  InvalidCredentialsError,
  NON_FIELD_ERRORS,
  NotFoundError,
  ValidationError
} from '../../core/errors.js';

export type AppEnv = {
  Variables: {
    service: TaskboardService;
    /** null for anonymous (and guest) requests */
    user: AuthUser | null;
  };
};

/**
 * Map a thrown error onto a JSON response. Unknown errors become 500s.
 */
export function errorResponse(c: Context, error: unknown): Response {
  if (error instanceof ValidationError) {
    return c.json(error.errors, 400);
  }
  if (error instanceof InvalidCredentialsError) {
    return c.json({ error: error.message }, 401);
  }
  if (error instanceof AuthenticationError) {
    return c.json({ detail: error.message }, 401);
  }
  if (error instanceof NotFoundError) {
    return c.json({ detail: error.message }, 404);
  }

  console.error(`[api] ${c.req.method} ${c.req.path} failed:`, error);
  return c.json({ error: error instanceof Error ? error.message : String(error) }, 500);
}

/**
 * Read the request body as JSON; a malformed body is a validation error.
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    throw ValidationError.forField(NON_FIELD_ERRORS, 'JSON parse error - request body is not valid JSON.');
  }
}

/**
 * Parse a path id. Anything that is not a positive integer cannot name a row.
 */
export function parseId(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new NotFoundError();
  }
  const id = parseInt(raw, 10);
  if (id <= 0) throw new NotFoundError();
  return id;
}

/**
 * Parse an optional numeric query filter; malformed values are rejected.
 */
export function parseOptionalIdQuery(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  if (!/^\d+$/.test(raw)) {
    throw ValidationError.forField(name, 'A valid integer is required.');
  }
  return parseInt(raw, 10);
}
