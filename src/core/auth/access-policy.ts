/**
 * Access policies
 * Every guarded route names one policy; there is no bypass variant.
 */

import type { AuthUser } from '../types.js';

export interface AccessContext {
  user: AuthUser | null;
  /** Value of the `guest_id` query parameter, if any. */
  guestId: string | null;
}

export interface AccessPolicy {
  readonly name: string;
  allows(ctx: AccessContext): boolean;
}

export const allowAny: AccessPolicy = {
  name: 'allow-any',
  allows: () => true
};

export const isAuthenticated: AccessPolicy = {
  name: 'authenticated',
  allows: (ctx) => ctx.user !== null
};

/** Signed-in users, or anonymous callers that identify as a guest. */
export const isAuthenticatedOrGuest: AccessPolicy = {
  name: 'authenticated-or-guest',
  allows: (ctx) => ctx.user !== null || (ctx.guestId !== null && ctx.guestId.trim().length > 0)
};
