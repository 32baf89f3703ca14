/**
 * Auth Module
 * Password hashing and request access policies
 */

export { hashPassword, verifyPassword } from './passwords.js';

export {
  allowAny,
  isAuthenticated,
  isAuthenticatedOrGuest,
  type AccessContext,
  type AccessPolicy
} from './access-policy.js';
