/**
 * Error types raised by the service layer and mapped to HTTP responses
 */

import type { ZodError } from 'zod';

export type FieldErrors = Record<string, string[]>;

export const NON_FIELD_ERRORS = 'non_field_errors';

export class ValidationError extends Error {
  readonly status = 400;

  constructor(readonly errors: FieldErrors) {
    super(Object.entries(errors).map(([field, messages]) => `${field}: ${messages.join(' ')}`).join('; '));
    this.name = 'ValidationError';
  }

  static forField(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: [message] });
  }
}

export class NotFoundError extends Error {
  readonly status = 404;

  constructor(message = 'Not found.') {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class AuthenticationError extends Error {
  readonly status = 401;

  constructor(message = 'Authentication credentials were not provided.') {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/** Bad login credentials; the response does not say which field was wrong. */
export class InvalidCredentialsError extends AuthenticationError {
  constructor() {
    super('Invalid credentials');
    this.name = 'InvalidCredentialsError';
  }
}

/**
 * Collapse Zod issues into a field-keyed payload.
 * Nested paths report under their top-level field (`contact_ids.2` -> `contact_ids`).
 */
export function fromZodError(error: ZodError): ValidationError {
  const errors: FieldErrors = {};
  for (const issue of error.issues) {
    const head = issue.path[0];
    const field = head === undefined ? NON_FIELD_ERRORS : String(head);
    (errors[field] ??= []).push(issue.message);
  }
  return new ValidationError(errors);
}
