// Utilities: Custom error types
// Business errors carry an HTTP status and a stable code; the API layer renders them verbatim

export class AppError extends Error {
  statusCode = 500;
  code = 'INTERNAL_ERROR';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/**
 * Duplicate username / email / contact
 */
export class ConflictError extends AppError {
  statusCode = 409;
  code = 'CONFLICT';
}

/**
 * Bad credentials, unusable bearer token, unconfirmed email at login
 */
export class UnauthenticatedError extends AppError {
  statusCode = 401;
  code = 'UNAUTHENTICATED';

  constructor(message: string, code?: string, details?: Record<string, unknown>) {
    super(message, details);
    if (code) {
      this.code = code;
    }
  }
}

export class ForbiddenError extends AppError {
  statusCode = 403;
  code = 'FORBIDDEN';
}

export class NotFoundError extends AppError {
  statusCode = 404;
  code = 'NOT_FOUND';
}

export class ValidationError extends AppError {
  code = 'VALIDATION_ERROR';

  constructor(message: string, statusCode: 400 | 422 = 400, details?: Record<string, unknown>) {
    super(message, details);
    this.statusCode = statusCode;
  }
}

/**
 * Signature, expiry or structure problem with a token.
 * Deliberately carries no detail about which check failed.
 */
export class InvalidTokenError extends AppError {
  statusCode = 400;
  code = 'INVALID_TOKEN';

  constructor() {
    super('Invalid or expired token');
  }
}

/**
 * A stored password digest that bcrypt cannot parse
 */
export class CorruptHashError extends AppError {
  constructor() {
    super('Stored password hash is corrupt');
  }
}

/**
 * Raised by repositories when a write would break a uniqueness rule.
 * Services translate it into ConflictError.
 */
export class UniqueConstraintError extends AppError {
  code = 'UNIQUE_CONSTRAINT';

  constructor(readonly field: string, readonly value: string) {
    super(`Unique constraint violated on ${field}`, { field });
  }
}
