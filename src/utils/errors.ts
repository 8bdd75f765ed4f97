/**
 * Application error taxonomy.
 *
 * Services throw these; routes turn them into JSON responses via
 * `handleRouteError`. Anything that is not an AppError is answered with a
 * generic 500.
 *
 * @module utils/errors
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed input, rejected before any state change. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
  }
}

/** The target already reached a terminal state (e.g. a sent campaign). */
export class AlreadyCompletedError extends AppError {
  constructor(message: string) {
    super(message, 'ALREADY_COMPLETED', 409);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
  }
}

/** One delivery attempt failed at the SMTP layer. */
export class TransportError extends AppError {
  constructor(message: string, public readonly recipient?: string) {
    super(message, 'TRANSPORT_ERROR', 502);
  }
}

export class TokenError extends AppError {}

export class InvalidTokenError extends TokenError {
  constructor(reason = 'Token is malformed or its signature does not match') {
    super(reason, 'INVALID_TOKEN', 400);
  }
}

export class ExpiredTokenError extends TokenError {
  constructor(public readonly ageSeconds: number, public readonly maxAgeSeconds: number) {
    super(`Token age ${ageSeconds}s exceeds ${maxAgeSeconds}s`, 'EXPIRED_TOKEN', 400);
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Invalid username or password.') {
    super(message, 'UNAUTHENTICATED', 401);
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
