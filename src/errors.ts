// =============================================================================
// COURSEWORK — Error Taxonomy
//
// Every expected failure is an AppError with a stable machine code and an
// HTTP status. The error handler serializes them as
//   { error: <message>, code: <CODE>, details?: ... }
//
//   ValidationFailed          user-correctable, never fatal to a batch
//   PermissionDenied          terminal for one operation, zero side effect
//   MissingColumn / Malformed terminal for a whole import, before any row
//   StoreUnavailable          infrastructure; retry policy lives outside
// =============================================================================

import { ErrorSet } from './types/pipeline';

export class AppError extends Error {
  readonly code: string;
  readonly httpStatus: number;
  readonly details?: unknown;

  constructor(code: string, message: string, httpStatus = 400, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = httpStatus;
    this.details = details;
  }
}

export class ValidationFailed extends AppError {
  readonly errors: ErrorSet;
  /** Submitted values, minus sensitive fields, for re-rendering the form */
  readonly input: Record<string, string>;

  constructor(errors: ErrorSet, input: Record<string, string> = {}) {
    super('VALIDATION_FAILED', 'Validation failed', 400);
    this.errors = errors;
    this.input = input;
  }
}

export class WeakCredential extends AppError {
  readonly reasons: string[];

  constructor(reasons: string[]) {
    super('WEAK_CREDENTIAL', 'Password does not meet the strength policy', 400, { reasons });
    this.reasons = reasons;
  }
}

export class MissingColumn extends AppError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super('MISSING_COLUMN', `Missing required column(s): ${missing.join(', ')}`, 400, { missing });
    this.missing = missing;
  }
}

export class MalformedSource extends AppError {
  constructor(message: string) {
    super('MALFORMED_SOURCE', message, 400);
  }
}

export class AuthenticationRequired extends AppError {
  constructor(message = 'Authentication required') {
    super('AUTHENTICATION_REQUIRED', message, 401);
  }
}

export class InvalidCredentials extends AppError {
  constructor() {
    super('INVALID_CREDENTIALS', 'Invalid credentials', 401);
  }
}

export class PermissionDenied extends AppError {
  constructor(message = 'Insufficient permissions', details?: unknown) {
    super('PERMISSION_DENIED', message, 403, details);
  }
}

export class NotFound extends AppError {
  constructor(what: string) {
    super('NOT_FOUND', `${what} not found`, 404);
  }
}

export class DuplicateIdentity extends AppError {
  constructor(credentialRef: string) {
    super('DUPLICATE_IDENTITY', `A user named "${credentialRef}" already exists`, 409);
  }
}

export class Conflict extends AppError {
  constructor(message: string) {
    super('CONFLICT', message, 409);
  }
}

export class StoreUnavailable extends AppError {
  constructor(message = 'Store unavailable', details?: unknown) {
    super('STORE_UNAVAILABLE', message, 503, details);
  }
}
